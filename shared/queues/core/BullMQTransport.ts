/**
 * Notification Dispatch - BullMQ Transport
 *
 * Redis-backed broker built on BullMQ queues with manually processed jobs.
 * Each consumer owns a BullMQ worker that fetches one job at a time and holds
 * its lock until the pool acks or rejects the delivery. Jobs whose consumer
 * disappears are returned to the queue by BullMQ's stalled-job check.
 *
 * Every delivery cycle of an envelope is its own job, keyed by envelope id and
 * attempt, so a redelivery published twice is stored once.
 */

import { randomUUID } from 'crypto';
import { Queue, Worker, type ConnectionOptions, type Job, type JobsOptions } from 'bullmq';
import type {
  AckHandle,
  BrokerTransport,
  Delivery,
  TaskEnvelope,
  WireMessage,
} from '../types/interfaces';
import { BULLMQ_PREFIX, DEAD_LETTER_SUFFIX, DELIVERY_LOCK_MS, MAX_STALLED_COUNT } from '../types/queue-configs';
import { Logger } from '../../logging/logger';
import { decodeEnvelope, deliveryKey, encodeEnvelope } from './TaskEnvelope';
import { BrokerUnavailableError, DeliveryAlreadySettledError, EnvelopeError, QueueError } from './errors';

/**
 * Stored in `<queue>-dlq` for every permanently failed envelope.
 */
export interface DeadLetterEntry extends WireMessage {
  taskId: string;
  taskName: string;
  attempt: number;
  reason: string;
  failedAt: string;
}

export interface BullMQTransportOptions {
  /** Connection shared by every queue this transport publishes to. */
  producer: ConnectionOptions;
  /** Options for the blocking connection each consumer opens for itself. */
  consumer: ConnectionOptions;
  prefix?: string;
  lockDurationMs?: number;
  /** Seconds a consumer blocks waiting for a job before re-checking for shutdown. */
  drainDelaySeconds?: number;
  logger?: Logger;
}

interface ActiveDelivery {
  job: Job<WireMessage>;
  token: string;
}

const DEFAULT_JOB_OPTIONS: JobsOptions = {
  attempts: 1,
  removeOnComplete: true,
  removeOnFail: { count: 1000 },
};

export class BullMQTransport implements BrokerTransport {
  private queues = new Map<string, Queue<WireMessage>>();
  private deadLetterQueues = new Map<string, Queue<DeadLetterEntry>>();
  private active = new Map<string, ActiveDelivery>();
  private consumers = new Set<Worker<WireMessage>>();
  private closed = false;
  private readonly prefix: string;
  private readonly lockDurationMs: number;
  private readonly drainDelaySeconds: number;
  private logger: Logger;

  constructor(private readonly options: BullMQTransportOptions) {
    this.prefix = options.prefix ?? BULLMQ_PREFIX;
    this.lockDurationMs = options.lockDurationMs ?? DELIVERY_LOCK_MS;
    this.drainDelaySeconds = options.drainDelaySeconds ?? 2;
    this.logger = options.logger ?? new Logger('bullmq-transport');
  }

  // =============================================
  // Publishing
  // =============================================

  async enqueue(envelope: TaskEnvelope): Promise<void> {
    await this.publish(envelope, {});
    this.logger.debug(`Envelope enqueued: ${envelope.taskName}`, {
      taskId: envelope.id,
      taskName: envelope.taskName,
      queue: envelope.queue,
    });
  }

  async scheduleRedelivery(envelope: TaskEnvelope, delayMs: number): Promise<void> {
    await this.publish(envelope, { delay: Math.max(0, delayMs) });
  }

  async deadLetter(envelope: TaskEnvelope, reason: string): Promise<void> {
    const message = encodeEnvelope(envelope);
    const entry: DeadLetterEntry = {
      ...message,
      taskId: envelope.id,
      taskName: envelope.taskName,
      attempt: envelope.attempt,
      reason,
      failedAt: new Date().toISOString(),
    };

    try {
      await this.getDeadLetterQueue(envelope.queue).add(envelope.taskName, entry, {
        jobId: deliveryKey(envelope),
        removeOnComplete: false,
        removeOnFail: false,
      });
    } catch (error) {
      throw new BrokerUnavailableError(`Failed to dead-letter ${envelope.taskName}`, { cause: error });
    }
  }

  private async publish(envelope: TaskEnvelope, options: JobsOptions): Promise<void> {
    if (this.closed) {
      throw new BrokerUnavailableError('Transport is closed');
    }

    const message = encodeEnvelope(envelope);
    try {
      await this.getQueue(envelope.queue).add(envelope.taskName, message, {
        ...DEFAULT_JOB_OPTIONS,
        ...options,
        jobId: deliveryKey(envelope),
      });
    } catch (error) {
      if (error instanceof QueueError) throw error;
      throw new BrokerUnavailableError(`Failed to publish ${envelope.taskName} to ${envelope.queue}`, {
        cause: error,
      });
    }
  }

  // =============================================
  // Consuming
  // =============================================

  async *consume(queueName: string, signal?: AbortSignal): AsyncIterable<Delivery> {
    if (this.closed) return;

    const worker = new Worker<WireMessage>(queueName, null, {
      connection: this.options.consumer,
      prefix: this.prefix,
      autorun: false,
      lockDuration: this.lockDurationMs,
      maxStalledCount: MAX_STALLED_COUNT,
      drainDelay: this.drainDelaySeconds,
    });
    this.consumers.add(worker);
    const token = randomUUID();

    try {
      await worker.startStalledCheckTimer();

      while (!this.closed && !signal?.aborted) {
        let job: Job<WireMessage> | undefined;
        try {
          job = await worker.getNextJob(token, { block: true });
        } catch (error) {
          if (this.closed || signal?.aborted) break;
          this.logger.logError(`Failed to fetch from ${queueName}`, error, { queue: queueName });
          await new Promise(resolve => setTimeout(resolve, 1000));
          continue;
        }

        if (!job) continue;

        if (this.closed || signal?.aborted) {
          await job.moveToDelayed(Date.now(), token);
          break;
        }

        let envelope: TaskEnvelope;
        try {
          envelope = decodeEnvelope(job.data);
        } catch (error) {
          const reason = error instanceof Error ? error : new EnvelopeError(String(error));
          this.logger.logError(`Discarding undecodable job ${job.id} on ${queueName}`, reason, { queue: queueName });
          await job.moveToFailed(reason, token, false);
          continue;
        }

        const deliveryId = `${queueName}:${job.id ?? deliveryKey(envelope)}`;
        this.active.set(deliveryId, { job, token });
        yield { envelope, handle: { deliveryId, queue: queueName } };
      }
    } finally {
      this.consumers.delete(worker);
      await this.closeConsumer(worker);
    }
  }

  async ack(handle: AckHandle): Promise<void> {
    const { job, token } = this.settle(handle);
    await job.moveToCompleted(null, token, false);
  }

  async reject(handle: AckHandle, requeue: boolean): Promise<void> {
    const { job, token } = this.settle(handle);
    if (requeue) {
      await job.moveToDelayed(Date.now(), token);
    } else {
      await job.moveToFailed(new Error('Rejected without requeue'), token, false);
    }
  }

  // =============================================
  // Lifecycle
  // =============================================

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const closing: Promise<void>[] = [];
    for (const worker of this.consumers) {
      closing.push(worker.close(true));
    }
    for (const queue of this.queues.values()) {
      closing.push(queue.close());
    }
    for (const queue of this.deadLetterQueues.values()) {
      closing.push(queue.close());
    }

    await Promise.all(closing);
    this.logger.info('BullMQ transport closed', { abandonedDeliveries: this.active.size });
    this.active.clear();
  }

  private settle(handle: AckHandle): ActiveDelivery {
    const entry = this.active.get(handle.deliveryId);
    if (!entry) {
      throw new DeliveryAlreadySettledError(handle.deliveryId);
    }
    this.active.delete(handle.deliveryId);
    return entry;
  }

  private async closeConsumer(worker: Worker<WireMessage>): Promise<void> {
    try {
      await worker.close();
    } catch (error) {
      this.logger.logError('Failed to close consumer', error);
    }
  }

  private getQueue(name: string): Queue<WireMessage> {
    let queue = this.queues.get(name);
    if (!queue) {
      queue = new Queue<WireMessage>(name, { connection: this.options.producer, prefix: this.prefix });
      queue.on('error', error => this.logger.logError(`Queue error on ${name}`, error));
      this.queues.set(name, queue);
    }
    return queue;
  }

  private getDeadLetterQueue(name: string): Queue<DeadLetterEntry> {
    const dlqName = `${name}${DEAD_LETTER_SUFFIX}`;
    let queue = this.deadLetterQueues.get(dlqName);
    if (!queue) {
      queue = new Queue<DeadLetterEntry>(dlqName, { connection: this.options.producer, prefix: this.prefix });
      queue.on('error', error => this.logger.logError(`Queue error on ${dlqName}`, error));
      this.deadLetterQueues.set(dlqName, queue);
    }
    return queue;
  }
}
