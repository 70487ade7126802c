import { loadSettings, type Settings } from '../../config/settings';
import { Logger } from '../../logging/logger';
import { getDb, closeDatabaseConnection } from '../../db/connection';
import { DrizzleNotificationRepository, type NotificationRepository } from '../../db/NotificationRepository';
import { createSmtpEmailSender, type EmailSender } from '../../email/EmailSender';
import { closeRedisConnections, getProducerConnection } from '../../redis/connection';
import { BullMQTransport } from '../core/BullMQTransport';
import { InMemoryTransport } from '../core/InMemoryTransport';
import { Dispatcher } from '../core/Dispatcher';
import { RetryScheduler } from '../core/RetryScheduler';
import { TaskRegistry, TaskRegistryBuilder, TaskRouteTable, toTaskRoute } from '../core/TaskRegistry';
import { WorkerPool } from '../core/WorkerPool';
import type { BrokerTransport, RetryPolicy } from '../types/interfaces';
import { buildConsumerOptions, getNotificationRetryPolicies } from '../types/queue-configs';
import {
  EMAIL_QUEUE,
  TASK_NAMES,
  bookingNotificationSchema,
  paymentNotificationSchema,
  type NotificationPayloads,
  type NotificationTaskName,
} from '../types/task-types';
import { BookingConfirmationProcessor } from '../processors/BookingConfirmationProcessor';
import { PaymentConfirmationProcessor } from '../processors/PaymentConfirmationProcessor';
import { PaymentFailedProcessor } from '../processors/PaymentFailedProcessor';

const logger = new Logger('queue-setup');

export interface NotificationRouteOptions {
  retryPolicies?: Record<NotificationTaskName, RetryPolicy>;
  /** Overrides the route table for every notification task. */
  queue?: string;
}

export interface NotificationDependencies extends NotificationRouteOptions {
  repository: NotificationRepository;
  sender: EmailSender;
}

export interface NotificationRuntime {
  registry: TaskRegistry;
  transport: BrokerTransport;
  dispatcher: Dispatcher<NotificationPayloads>;
  pool: WorkerPool;
}

function notificationRoutes(options: NotificationRouteOptions) {
  const policies = options.retryPolicies ?? getNotificationRetryPolicies();
  const queue = options.queue ?? EMAIL_QUEUE;

  return {
    bookingConfirmation: {
      name: TASK_NAMES.BOOKING_CONFIRMATION,
      queue,
      retryPolicy: policies[TASK_NAMES.BOOKING_CONFIRMATION],
      payloadSchema: bookingNotificationSchema,
    },
    paymentConfirmation: {
      name: TASK_NAMES.PAYMENT_CONFIRMATION,
      queue,
      retryPolicy: policies[TASK_NAMES.PAYMENT_CONFIRMATION],
      payloadSchema: paymentNotificationSchema,
    },
    paymentFailed: {
      name: TASK_NAMES.PAYMENT_FAILED,
      queue,
      retryPolicy: policies[TASK_NAMES.PAYMENT_FAILED],
      payloadSchema: paymentNotificationSchema,
    },
  };
}

export function buildNotificationRegistry(deps: NotificationDependencies): TaskRegistry {
  const routes = notificationRoutes(deps);

  const registry = new TaskRegistryBuilder()
    .register({
      ...routes.bookingConfirmation,
      handler: new BookingConfirmationProcessor(deps.repository, deps.sender).handler(),
    })
    .register({
      ...routes.paymentConfirmation,
      handler: new PaymentConfirmationProcessor(deps.repository, deps.sender).handler(),
    })
    .register({
      ...routes.paymentFailed,
      handler: new PaymentFailedProcessor(deps.repository, deps.sender).handler(),
    })
    .build();

  registry.assertRegistered(Object.values(TASK_NAMES));
  return registry;
}

/**
 * Routes for the notification tasks without their handlers.
 */
export function buildNotificationRoutes(options: NotificationRouteOptions = {}): TaskRouteTable {
  const routes = notificationRoutes(options);
  const table = new TaskRouteTable([
    toTaskRoute(routes.bookingConfirmation),
    toTaskRoute(routes.paymentConfirmation),
    toTaskRoute(routes.paymentFailed),
  ]);

  table.assertRouted(Object.values(TASK_NAMES));
  return table;
}

export function createTransport(settings: Settings): BrokerTransport {
  if (settings.broker.driver === 'memory') {
    logger.warn('Using the in-memory broker; envelopes do not survive a restart');
    return new InMemoryTransport();
  }

  return new BullMQTransport({
    producer: getProducerConnection(settings.broker.redis),
    consumer: buildConsumerOptions(settings.broker.redis),
  });
}

/**
 * Dispatcher for processes that enqueue notifications but run no workers.
 */
export function createNotificationDispatcher(
  settings: Settings,
  transport: BrokerTransport
): Dispatcher<NotificationPayloads> {
  const routes = buildNotificationRoutes({ retryPolicies: getNotificationRetryPolicies(settings.worker) });
  return new Dispatcher<NotificationPayloads>(transport, routes, dispatcherOptions(settings));
}

function dispatcherOptions(settings: Settings) {
  return {
    enqueueAttempts: settings.broker.enqueueAttempts,
    retryDelayMs: settings.broker.enqueueRetryDelayMs,
  };
}

/**
 * Wire registry, dispatcher and worker pool over one transport. Nothing is
 * started.
 */
export function createNotificationRuntime(
  settings: Settings,
  deps: NotificationDependencies,
  transport: BrokerTransport = createTransport(settings)
): NotificationRuntime {
  const registry = buildNotificationRegistry({
    retryPolicies: getNotificationRetryPolicies(settings.worker),
    ...deps,
  });

  const dispatcher = new Dispatcher<NotificationPayloads>(transport, registry, dispatcherOptions(settings));

  const retryScheduler = new RetryScheduler(transport, { maxDelaySeconds: settings.worker.maxDelaySeconds });
  const pool = new WorkerPool(transport, registry, retryScheduler, {
    queues: settings.worker.queues,
    graceMs: settings.worker.graceMs,
  });

  return { registry, transport, dispatcher, pool };
}

/**
 * Production wiring: postgres read model, SMTP sender and the configured broker.
 */
export function createProductionRuntime(settings: Settings = loadSettings()): NotificationRuntime {
  return createNotificationRuntime(settings, {
    repository: new DrizzleNotificationRepository(getDb(settings.database)),
    sender: createSmtpEmailSender(settings.email),
  });
}

export async function setupNotificationQueues(settings: Settings = loadSettings()): Promise<NotificationRuntime> {
  logger.info('Setting up notification queues...');

  try {
    const runtime = createProductionRuntime(settings);
    runtime.pool.start(settings.worker.concurrency);

    logger.info('Notification queues and workers initialized', {
      queues: settings.worker.queues,
      concurrency: settings.worker.concurrency,
      tasks: runtime.registry.list().map(task => task.name),
    });
    return runtime;
  } catch (error) {
    logger.logError('Error setting up notification queues', error);
    throw error;
  }
}

export async function shutdownNotificationQueues(runtime: NotificationRuntime, graceMs?: number): Promise<void> {
  logger.info('Shutting down notification queues...');

  try {
    await runtime.pool.stop(graceMs);
    await runtime.transport.close();
    await closeRedisConnections();
    await closeDatabaseConnection();
    logger.info('Notification queues shut down', { ...runtime.pool.getStats() });
  } catch (error) {
    logger.logError('Error shutting down notification queues', error);
    throw error;
  }
}
