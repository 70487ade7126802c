/**
 * Notification Dispatch - Main Exports
 *
 * Entry point for the task-dispatch core: transports, registry, retry
 * scheduling, the worker pool, the dispatcher and the notification tasks.
 */

// =============================================
// Core Components
// =============================================
export { BullMQTransport, type BullMQTransportOptions, type DeadLetterEntry } from './core/BullMQTransport';
export { InMemoryTransport, type InMemoryTransportOptions, type ScheduledRedelivery } from './core/InMemoryTransport';
export { TaskRegistry, TaskRegistryBuilder, TaskRouteTable, toTaskRoute } from './core/TaskRegistry';
export { RetryScheduler, computeRedeliveryDelay, type RetrySchedulerOptions } from './core/RetryScheduler';
export { WorkerPool } from './core/WorkerPool';
export { Dispatcher, type DispatcherOptions, type DispatchOptions } from './core/Dispatcher';
export { classifyError } from './core/ErrorClassifier';
export { createEnvelope, nextAttempt, encodeEnvelope, decodeEnvelope, deliveryKey } from './core/TaskEnvelope';
export * from './core/errors';

// =============================================
// Types and Configuration
// =============================================
export * from './types/interfaces';
export * from './types/task-types';
export * from './types/queue-configs';

// =============================================
// Notification Tasks
// =============================================
export { BookingConfirmationProcessor } from './processors/BookingConfirmationProcessor';
export { PaymentConfirmationProcessor, nightsBetween } from './processors/PaymentConfirmationProcessor';
export { PaymentFailedProcessor } from './processors/PaymentFailedProcessor';
export {
  buildNotificationRegistry,
  buildNotificationRoutes,
  createNotificationDispatcher,
  createNotificationRuntime,
  createProductionRuntime,
  createTransport,
  setupNotificationQueues,
  shutdownNotificationQueues,
  type NotificationDependencies,
  type NotificationRuntime,
} from './setup/notification-setup';
