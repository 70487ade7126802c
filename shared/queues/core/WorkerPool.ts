/**
 * Notification Dispatch - Worker Pool
 *
 * Runs a fixed number of execution contexts, each pulling deliveries from one
 * queue, resolving the handler by task name, executing it and settling the
 * delivery according to the retry scheduler's decision.
 *
 * Handler errors never leave a context: they are classified into outcomes.
 * On stop, contexts stop pulling and in-flight executions get a grace period;
 * executions still running at the deadline are abandoned and their deliveries
 * rejected with requeue.
 */

import { EventEmitter } from 'events';
import type {
  BrokerTransport,
  Delivery,
  RegisteredTask,
  TaskContext,
  TaskEnvelope,
  TaskOutcome,
  WorkerPoolEvent,
  WorkerPoolOptions,
  WorkerPoolStats,
} from '../types/interfaces';
import { Logger, type AttemptOutcomeLabel, type TaskAttemptRecord } from '../../logging/logger';
import type { TaskRegistry } from './TaskRegistry';
import type { RetryScheduler } from './RetryScheduler';
import { classifyError } from './ErrorClassifier';
import { PoolStateError } from './errors';

const ABANDONED = Symbol('abandoned');

const DEFAULT_GRACE_MS = 30000;

interface Counters {
  processed: number;
  succeeded: number;
  retried: number;
  failedPermanently: number;
  unresolved: number;
  abandoned: number;
}

export class WorkerPool extends EventEmitter {
  private readonly queues: string[];
  private readonly graceMs: number;
  private logger: Logger;
  private running = false;
  private contexts: Promise<void>[] = [];
  private pullController = new AbortController();
  private executionController = new AbortController();
  private inFlight = 0;
  private counters: Counters = {
    processed: 0,
    succeeded: 0,
    retried: 0,
    failedPermanently: 0,
    unresolved: 0,
    abandoned: 0,
  };

  constructor(
    private readonly transport: BrokerTransport,
    private readonly registry: TaskRegistry,
    private readonly retryScheduler: RetryScheduler,
    options: WorkerPoolOptions
  ) {
    super();
    if (options.queues.length === 0) {
      throw new PoolStateError('Worker pool needs at least one queue');
    }
    this.queues = [...options.queues];
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.logger = options.logger ?? new Logger('worker-pool');
  }

  emit(event: WorkerPoolEvent, ...args: unknown[]): boolean {
    return super.emit(event, ...args);
  }

  // =============================================
  // Lifecycle
  // =============================================

  /**
   * Launch `concurrency` contexts, assigned round-robin over the queues.
   */
  start(concurrency: number): void {
    if (this.running) {
      throw new PoolStateError('Worker pool is already running');
    }
    if (!Number.isInteger(concurrency) || concurrency < this.queues.length) {
      throw new PoolStateError(
        `Concurrency must be an integer of at least ${this.queues.length} (one context per queue), got ${concurrency}`
      );
    }

    this.running = true;
    this.pullController = new AbortController();
    this.executionController = new AbortController();
    this.contexts = Array.from({ length: concurrency }, (_, index) =>
      this.runContext(index, this.queues[index % this.queues.length])
    );

    this.logger.info(`Worker pool started with ${concurrency} context(s)`, { queues: this.queues });
  }

  async stop(graceMs: number = this.graceMs): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.logger.info('Worker pool stopping', { inFlight: this.inFlight, graceMs });
    this.pullController.abort();

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'deadline'>(resolve => {
      timer = setTimeout(() => resolve('deadline'), graceMs);
    });
    const drained = Promise.all(this.contexts).then(() => 'drained' as const);

    const result = await Promise.race([drained, deadline]);
    clearTimeout(timer);

    if (result === 'deadline') {
      this.logger.warn('Grace period elapsed, abandoning in-flight tasks', { inFlight: this.inFlight });
      this.executionController.abort();
      await drained;
    }

    this.contexts = [];
    this.emit('stopped', this.getStats());
    this.logger.info('Worker pool stopped', { ...this.getStats() });
  }

  getStats(): WorkerPoolStats {
    return {
      running: this.running,
      contexts: this.contexts.length,
      inFlight: this.inFlight,
      ...this.counters,
    };
  }

  // =============================================
  // Execution Contexts
  // =============================================

  private async runContext(index: number, queue: string): Promise<void> {
    const contextLogger = this.logger.child({ context: index, queue });
    contextLogger.debug(`Context ${index} consuming ${queue}`);

    try {
      for await (const delivery of this.transport.consume(queue, this.pullController.signal)) {
        try {
          await this.processDelivery(delivery);
        } catch (error) {
          contextLogger.logError('Failed to settle delivery', error, {
            taskId: delivery.envelope.id,
            taskName: delivery.envelope.taskName,
          });
          this.emit('context-error', { context: index, queue, error });
          await this.handBack(delivery, contextLogger);
        }
      }
    } catch (error) {
      contextLogger.logError(`Context ${index} stopped consuming`, error);
      this.emit('context-error', { context: index, queue, error });
    }
  }

  private async processDelivery(delivery: Delivery): Promise<void> {
    const { envelope, handle } = delivery;
    const startedAt = Date.now();
    this.inFlight++;

    try {
      const task = this.registry.resolve(envelope.taskName);
      if (!task) {
        const reason = `No handler registered for ${envelope.taskName}`;
        await this.transport.reject(handle, false);
        this.counters.unresolved++;
        this.record(envelope, 'unresolved', startedAt, reason);
        this.emit('task-unresolved', { envelope, reason });
        return;
      }

      this.emit('task-started', { envelope });
      const outcome = await this.execute(task, envelope);

      if (outcome === ABANDONED) {
        await this.transport.reject(handle, true);
        this.counters.abandoned++;
        this.record(envelope, 'abandoned', startedAt, 'Aborted at shutdown deadline');
        this.emit('task-abandoned', { envelope });
        return;
      }

      const decision = this.retryScheduler.decide(envelope, task.retryPolicy, outcome);

      switch (decision.action) {
        case 'ack': {
          await this.transport.ack(handle);
          this.counters.succeeded++;
          this.record(envelope, 'success', startedAt);
          this.emit('task-completed', { envelope });
          break;
        }

        case 'redeliver': {
          const reason = outcome.kind === 'success' ? undefined : outcome.reason;
          try {
            await this.retryScheduler.schedule(decision);
          } catch (error) {
            // Could not publish the next attempt; hand the current one back instead.
            this.logger.logError('Failed to schedule redelivery', error, {
              taskId: envelope.id,
              taskName: envelope.taskName,
            });
            await this.transport.reject(handle, true);
            this.counters.retried++;
            this.record(envelope, 'retry', startedAt, reason);
            return;
          }
          await this.transport.ack(handle);
          this.counters.retried++;
          this.record(envelope, 'retry', startedAt, reason);
          this.emit('task-retry-scheduled', { envelope: decision.envelope, delaySeconds: decision.delaySeconds });
          break;
        }

        case 'dead-letter': {
          await this.transport.deadLetter(envelope, decision.reason);
          await this.transport.ack(handle);
          this.counters.failedPermanently++;
          this.record(envelope, 'fatal', startedAt, decision.reason);
          this.emit('task-failed-permanently', {
            envelope,
            reason: decision.reason,
            exhausted: decision.exhausted,
          });
          break;
        }
      }
    } finally {
      this.inFlight--;
      this.counters.processed++;
    }
  }

  /**
   * Return a delivery that could not be settled so the broker hands it out
   * again now rather than when its lock expires.
   */
  private async handBack(delivery: Delivery, logger: Logger): Promise<void> {
    try {
      await this.transport.reject(delivery.handle, true);
    } catch (error) {
      logger.logError('Failed to return delivery to the broker', error, {
        taskId: delivery.envelope.id,
        taskName: delivery.envelope.taskName,
      });
    }
  }

  private async execute(task: RegisteredTask, envelope: TaskEnvelope): Promise<TaskOutcome | typeof ABANDONED> {
    const signal = this.executionController.signal;
    const context: TaskContext = {
      envelope,
      logger: this.logger.child({ taskId: envelope.id, taskName: envelope.taskName, attempt: envelope.attempt }),
      signal,
    };

    const run = (async (): Promise<TaskOutcome> => {
      try {
        return await task.execute(envelope.payload, context);
      } catch (error) {
        context.logger.logError(`Task ${task.name} threw`, error);
        return classifyError(error);
      }
    })();

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<typeof ABANDONED>(resolve => {
      onAbort = () => resolve(ABANDONED);
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([run, aborted]);
    } finally {
      if (onAbort) signal.removeEventListener('abort', onAbort);
    }
  }

  private record(envelope: TaskEnvelope, outcome: AttemptOutcomeLabel, startedAt: number, reason?: string): void {
    const record: TaskAttemptRecord = {
      taskId: envelope.id,
      taskName: envelope.taskName,
      queue: envelope.queue,
      attempt: envelope.attempt,
      outcome,
      reason,
      durationMs: Date.now() - startedAt,
      timestampEnd: new Date().toISOString(),
    };
    this.logger.logTaskAttempt(record);
  }
}
