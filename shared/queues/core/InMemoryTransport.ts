/**
 * Notification Dispatch - In-Memory Transport
 *
 * Single-process broker used by tests and local development. Messages are
 * stored encoded, exactly as they would be on Redis, so every delivery goes
 * through the same wire contract as production.
 */

import type {
  AckHandle,
  BrokerTransport,
  DeadLetterRecord,
  Delivery,
  TaskEnvelope,
  WireMessage,
} from '../types/interfaces';
import { Logger } from '../../logging/logger';
import { decodeEnvelope, encodeEnvelope } from './TaskEnvelope';
import { BrokerUnavailableError, DeliveryAlreadySettledError } from './errors';

type Waiter = (message: WireMessage | null) => void;

interface UnackedMessage {
  queue: string;
  message: WireMessage;
}

export interface ScheduledRedelivery {
  envelope: TaskEnvelope;
  delayMs: number;
}

export interface InMemoryTransportOptions {
  /**
   * Multiplier applied to redelivery delays. 0 makes redeliveries immediate
   * while still recording the requested delay.
   */
  delayFactor?: number;
  logger?: Logger;
}

export class InMemoryTransport implements BrokerTransport {
  readonly deadLetters: DeadLetterRecord[] = [];
  readonly redeliveries: ScheduledRedelivery[] = [];

  private queues = new Map<string, WireMessage[]>();
  private waiters = new Map<string, Waiter[]>();
  private unacked = new Map<string, UnackedMessage>();
  private timers = new Set<NodeJS.Timeout>();
  private sequence = 0;
  private available = true;
  private closed = false;
  private readonly delayFactor: number;
  private logger: Logger;

  constructor(options: InMemoryTransportOptions = {}) {
    this.delayFactor = options.delayFactor ?? 1;
    this.logger = options.logger ?? new Logger('memory-transport');
  }

  // =============================================
  // Publishing
  // =============================================

  async enqueue(envelope: TaskEnvelope): Promise<void> {
    const message = encodeEnvelope(envelope);
    this.assertAvailable();
    this.push(envelope.queue, message);
  }

  async scheduleRedelivery(envelope: TaskEnvelope, delayMs: number): Promise<void> {
    const message = encodeEnvelope(envelope);
    this.assertAvailable();
    this.redeliveries.push({ envelope, delayMs });

    const effectiveDelay = delayMs * this.delayFactor;
    if (effectiveDelay <= 0) {
      this.push(envelope.queue, message);
      return;
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.push(envelope.queue, message);
    }, effectiveDelay);
    this.timers.add(timer);
  }

  async deadLetter(envelope: TaskEnvelope, reason: string): Promise<void> {
    this.assertAvailable();
    this.deadLetters.push({ envelope, reason, failedAt: new Date() });
  }

  // =============================================
  // Consuming
  // =============================================

  async *consume(queueName: string, signal?: AbortSignal): AsyncIterable<Delivery> {
    while (!this.closed && !signal?.aborted) {
      const message = await this.take(queueName, signal);
      if (!message) return;

      if (signal?.aborted || this.closed) {
        this.list(queueName).unshift(message);
        return;
      }

      let envelope: TaskEnvelope;
      try {
        envelope = decodeEnvelope(message);
      } catch (error) {
        this.logger.logError(`Dropping undecodable message on ${queueName}`, error);
        continue;
      }

      const deliveryId = `${queueName}:${++this.sequence}`;
      this.unacked.set(deliveryId, { queue: queueName, message });
      yield { envelope, handle: { deliveryId, queue: queueName } };
    }
  }

  async ack(handle: AckHandle): Promise<void> {
    this.settle(handle);
  }

  async reject(handle: AckHandle, requeue: boolean): Promise<void> {
    const entry = this.settle(handle);
    if (requeue && !this.closed) {
      this.push(entry.queue, entry.message);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();

    for (const waiters of this.waiters.values()) {
      for (const waiter of waiters.splice(0)) {
        waiter(null);
      }
    }
  }

  // =============================================
  // Inspection
  // =============================================

  /**
   * Simulate the broker becoming unreachable (or reachable again).
   */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  pendingCount(queueName: string): number {
    return this.queues.get(queueName)?.length ?? 0;
  }

  get inFlightCount(): number {
    return this.unacked.size;
  }

  // =============================================
  // Internals
  // =============================================

  private assertAvailable(): void {
    if (this.closed) {
      throw new BrokerUnavailableError('Transport is closed');
    }
    if (!this.available) {
      throw new BrokerUnavailableError('Broker is unavailable');
    }
  }

  private list(queueName: string): WireMessage[] {
    let messages = this.queues.get(queueName);
    if (!messages) {
      messages = [];
      this.queues.set(queueName, messages);
    }
    return messages;
  }

  private push(queueName: string, message: WireMessage): void {
    const waiter = this.waiters.get(queueName)?.shift();
    if (waiter) {
      waiter(message);
    } else {
      this.list(queueName).push(message);
    }
  }

  private take(queueName: string, signal?: AbortSignal): Promise<WireMessage | null> {
    const next = this.queues.get(queueName)?.shift();
    if (next) return Promise.resolve(next);

    return new Promise(resolve => {
      let waiters = this.waiters.get(queueName);
      if (!waiters) {
        waiters = [];
        this.waiters.set(queueName, waiters);
      }
      const pending = waiters;

      const onAbort = () => {
        const index = pending.indexOf(waiter);
        if (index >= 0) pending.splice(index, 1);
        resolve(null);
      };
      const waiter: Waiter = message => {
        signal?.removeEventListener('abort', onAbort);
        resolve(message);
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      pending.push(waiter);
    });
  }

  private settle(handle: AckHandle): UnackedMessage {
    const entry = this.unacked.get(handle.deliveryId);
    if (!entry) {
      throw new DeliveryAlreadySettledError(handle.deliveryId);
    }
    this.unacked.delete(handle.deliveryId);
    return entry;
  }
}
