/**
 * Notification Dispatch - Core Interfaces
 *
 * Contracts shared by the broker transports, the task registry, the retry
 * scheduler and the worker pool.
 */

import type { z } from 'zod';
import type { Logger } from '../../logging/logger';

// =============================================
// Envelope
// =============================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Task Payload
 * Named arguments of a task. Key order is preserved on the wire.
 */
export type TaskPayload = { [key: string]: JsonValue };

/**
 * Task Envelope
 * A single unit of deferred work placed on the broker. Only `attempt` differs
 * between deliveries of the same task; a redelivery is a new envelope value.
 */
export interface TaskEnvelope<TPayload extends TaskPayload = TaskPayload> {
  readonly id: string;
  readonly taskName: string;
  readonly queue: string;
  readonly payload: Readonly<TPayload>;
  readonly attempt: number;
  readonly maxRetries: number;
  readonly createdAt: Date;
}

/**
 * Wire Message
 * What a transport stores: the encoded envelope and its content type.
 */
export interface WireMessage {
  body: string;
  contentType: string;
}

// =============================================
// Retry Policy & Outcomes
// =============================================

export type BackoffStrategy = 'fixed' | 'exponential';

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelaySeconds: number;
  readonly backoffStrategy: BackoffStrategy;
}

export type TaskOutcome =
  | { kind: 'success' }
  | { kind: 'retryable'; reason: string }
  | { kind: 'fatal'; reason: string };

export const TaskOutcome = {
  success: (): TaskOutcome => ({ kind: 'success' }),
  retryable: (reason: string): TaskOutcome => ({ kind: 'retryable', reason }),
  fatal: (reason: string): TaskOutcome => ({ kind: 'fatal', reason }),
};

/**
 * Retry Decision
 * What the worker must do with a delivery once its outcome is known.
 */
export type RetryDecision =
  | { action: 'ack' }
  | { action: 'redeliver'; envelope: TaskEnvelope; delaySeconds: number }
  | { action: 'dead-letter'; reason: string; exhausted: boolean };

// =============================================
// Broker Transport
// =============================================

/**
 * Opaque reference to one delivery, valid until it is acked or rejected.
 */
export interface AckHandle {
  readonly deliveryId: string;
  readonly queue: string;
}

export interface Delivery {
  envelope: TaskEnvelope;
  handle: AckHandle;
}

/**
 * Delayed publish capability used by the retry scheduler.
 */
export interface RedeliveryScheduler {
  scheduleRedelivery(envelope: TaskEnvelope, delayMs: number): Promise<void>;
}

export interface DeadLetterRecord {
  envelope: TaskEnvelope;
  reason: string;
  failedAt: Date;
}

export interface BrokerTransport extends RedeliveryScheduler {
  /**
   * Publish an envelope to its queue. Rejects with BrokerUnavailableError when
   * the broker cannot be reached.
   */
  enqueue(envelope: TaskEnvelope): Promise<void>;

  /**
   * Deliveries from one queue, one at a time, until the transport closes or
   * the signal aborts. Each delivery is invisible to other consumers until it
   * is settled.
   */
  consume(queueName: string, signal?: AbortSignal): AsyncIterable<Delivery>;

  ack(handle: AckHandle): Promise<void>;
  reject(handle: AckHandle, requeue: boolean): Promise<void>;

  deadLetter(envelope: TaskEnvelope, reason: string): Promise<void>;

  close(): Promise<void>;
}

// =============================================
// Task Definitions
// =============================================

/**
 * Execution Context
 * Passed to handlers alongside the payload.
 */
export interface TaskContext {
  envelope: TaskEnvelope;
  logger: Logger;
  signal: AbortSignal;
}

export type TaskHandler<TPayload> = (payload: TPayload, context: TaskContext) => Promise<TaskOutcome>;

export type PayloadSchema<TPayload> = z.ZodType<TPayload, z.ZodTypeDef, unknown>;

export interface TaskRouteDefinition<TPayload extends TaskPayload> {
  name: string;
  queue: string;
  retryPolicy: RetryPolicy;
  payloadSchema: PayloadSchema<TPayload>;
}

export interface TaskDefinition<TPayload extends TaskPayload> extends TaskRouteDefinition<TPayload> {
  handler: TaskHandler<TPayload>;
}

/**
 * Where a task is published and how its payload is checked, with the payload
 * type erased behind validation. Enough to dispatch a task without its handler.
 */
export interface TaskRoute {
  readonly name: string;
  readonly queue: string;
  readonly retryPolicy: RetryPolicy;
  validatePayload(payload: unknown): { ok: true; payload: TaskPayload } | { ok: false; reason: string };
}

export interface TaskRouter {
  resolve(taskName: string): TaskRoute | undefined;
}

/**
 * Registered Task
 * A route with its handler, so the registry can hold tasks of different
 * payload shapes in one map.
 */
export interface RegisteredTask extends TaskRoute {
  execute(payload: unknown, context: TaskContext): Promise<TaskOutcome>;
}

// =============================================
// Worker Pool
// =============================================

export interface WorkerPoolOptions {
  queues: string[];
  graceMs?: number;
  logger?: Logger;
}

export interface WorkerPoolStats {
  running: boolean;
  contexts: number;
  inFlight: number;
  processed: number;
  succeeded: number;
  retried: number;
  failedPermanently: number;
  unresolved: number;
  abandoned: number;
}

export type WorkerPoolEvent =
  | 'task-started'
  | 'task-completed'
  | 'task-retry-scheduled'
  | 'task-failed-permanently'
  | 'task-unresolved'
  | 'task-abandoned'
  | 'context-error'
  | 'stopped';
