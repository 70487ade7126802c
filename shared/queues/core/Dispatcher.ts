/**
 * Notification Dispatch - Dispatcher
 *
 * Caller-side entry point. Validates the task name and payload against the
 * task routes, builds the envelope and hands it to the broker, retrying briefly
 * while the broker is unreachable. Returns once the broker has accepted the
 * envelope; it never waits for a worker.
 */

import type { BrokerTransport, TaskEnvelope, TaskPayload, TaskRouter } from '../types/interfaces';
import { Logger } from '../../logging/logger';
import { createEnvelope } from './TaskEnvelope';
import { BrokerUnavailableError, EnvelopeError, UnknownTaskError } from './errors';

export interface DispatcherOptions {
  enqueueAttempts?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

export interface DispatchOptions {
  /** Overrides the queue the task was registered with. */
  queue?: string;
}

type PayloadMap<T> = { [K in keyof T]: TaskPayload };

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class Dispatcher<TPayloads extends PayloadMap<TPayloads> = Record<string, TaskPayload>> {
  private readonly enqueueAttempts: number;
  private readonly retryDelayMs: number;
  private logger: Logger;

  constructor(
    private readonly transport: BrokerTransport,
    private readonly routes: TaskRouter,
    options: DispatcherOptions = {}
  ) {
    this.enqueueAttempts = Math.max(1, options.enqueueAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 200;
    this.logger = options.logger ?? new Logger('dispatcher');
  }

  /**
   * Enqueue one task. Rejects with UnknownTaskError, EnvelopeError, or
   * BrokerUnavailableError once every attempt has failed.
   */
  async enqueue<TName extends keyof TPayloads & string>(
    taskName: TName,
    payload: TPayloads[TName],
    options: DispatchOptions = {}
  ): Promise<TaskEnvelope> {
    const task = this.routes.resolve(taskName);
    if (!task) {
      throw new UnknownTaskError([taskName]);
    }

    const validated = task.validatePayload(payload);
    if (!validated.ok) {
      throw new EnvelopeError(validated.reason);
    }

    const envelope = createEnvelope({
      taskName,
      queue: options.queue ?? task.queue,
      payload: validated.payload,
      maxRetries: task.retryPolicy.maxRetries,
    });

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.enqueueAttempts; attempt++) {
      try {
        await this.transport.enqueue(envelope);
        this.logger.info(`Task enqueued: ${taskName}`, {
          taskId: envelope.id,
          taskName,
          queue: envelope.queue,
        });
        return envelope;
      } catch (error) {
        if (!(error instanceof BrokerUnavailableError)) throw error;
        lastError = error;
        this.logger.warn(`Enqueue attempt ${attempt}/${this.enqueueAttempts} failed for ${taskName}`, {
          taskId: envelope.id,
          taskName,
          error: error.message,
        });
        if (attempt < this.enqueueAttempts) {
          await sleep(this.retryDelayMs * attempt);
        }
      }
    }

    throw new BrokerUnavailableError(
      `Broker unavailable after ${this.enqueueAttempts} attempt(s) enqueueing ${taskName}`,
      { cause: lastError }
    );
  }

  /**
   * Enqueue after a state change has committed. Failures are logged and never
   * reach the caller; resolves to the envelope, or null when nothing was queued.
   */
  async dispatch<TName extends keyof TPayloads & string>(
    taskName: TName,
    payload: TPayloads[TName],
    options: DispatchOptions = {}
  ): Promise<TaskEnvelope | null> {
    try {
      return await this.enqueue(taskName, payload, options);
    } catch (error) {
      this.logger.logError(`Failed to dispatch ${taskName}`, error, { taskName });
      return null;
    }
  }
}
