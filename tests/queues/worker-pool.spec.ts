import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { Dispatcher } from '../../shared/queues/core/Dispatcher';
import { InMemoryTransport } from '../../shared/queues/core/InMemoryTransport';
import { RetryScheduler } from '../../shared/queues/core/RetryScheduler';
import { createEnvelope } from '../../shared/queues/core/TaskEnvelope';
import { TaskRegistryBuilder } from '../../shared/queues/core/TaskRegistry';
import { WorkerPool } from '../../shared/queues/core/WorkerPool';
import { BrokerUnavailableError, PoolStateError } from '../../shared/queues/core/errors';
import {
  TaskOutcome,
  type RetryPolicy,
  type TaskEnvelope,
  type TaskHandler,
} from '../../shared/queues/types/interfaces';
import { testLogger, waitFor } from '../helpers/fakes';

const countSchema = z.object({ n: z.number() });
type Count = z.infer<typeof countSchema>;
type CountTasks = { count: Count };

const policy: RetryPolicy = { maxRetries: 3, baseDelaySeconds: 60, backoffStrategy: 'exponential' };

interface Harness {
  transport: InMemoryTransport;
  dispatcher: Dispatcher<CountTasks>;
  pool: WorkerPool;
}

const pools: WorkerPool[] = [];

function harness(handler: TaskHandler<Count>, transport = new InMemoryTransport({ delayFactor: 0, logger: testLogger })): Harness {
  const registry = new TaskRegistryBuilder(testLogger)
    .register({ name: 'count', queue: 'emails', retryPolicy: policy, payloadSchema: countSchema, handler })
    .build();
  const dispatcher = new Dispatcher<CountTasks>(transport, registry, { logger: testLogger });
  const pool = new WorkerPool(transport, registry, new RetryScheduler(transport), {
    queues: ['emails'],
    graceMs: 1000,
    logger: testLogger,
  });
  pools.push(pool);
  return { transport, dispatcher, pool };
}

afterEach(async () => {
  await Promise.all(pools.splice(0).map(pool => pool.stop(0)));
});

describe('WorkerPool', () => {
  it('executes a dispatched task once and acks it', async () => {
    const handler = vi.fn(async (_payload: Count) => TaskOutcome.success());
    const { transport, dispatcher, pool } = harness(handler);
    const completed = vi.fn();
    pool.on('task-completed', completed);

    pool.start(1);
    await dispatcher.enqueue('count', { n: 7 });
    await waitFor(() => pool.getStats().succeeded === 1);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0]).toEqual({ n: 7 });
    expect(completed).toHaveBeenCalledTimes(1);
    expect(transport.inFlightCount).toBe(0);
    expect(transport.deadLetters).toEqual([]);
    expect(pool.getStats()).toMatchObject({ running: true, contexts: 1, processed: 1, retried: 0 });
  });

  it('retries with growing delays and dead-letters once retries are exhausted', async () => {
    const attempts: number[] = [];
    const { transport, dispatcher, pool } = harness(async (_payload, context) => {
      attempts.push(context.envelope.attempt);
      return TaskOutcome.retryable('smtp down');
    });
    const failed = vi.fn();
    pool.on('task-failed-permanently', failed);

    pool.start(1);
    const envelope = await dispatcher.enqueue('count', { n: 1 });
    await waitFor(() => pool.getStats().failedPermanently === 1);

    expect(attempts).toEqual([0, 1, 2]);
    expect(transport.redeliveries.map(r => r.delayMs)).toEqual([60000, 120000]);
    expect(transport.redeliveries.map(r => r.envelope.attempt)).toEqual([1, 2]);
    expect(transport.deadLetters).toHaveLength(1);
    expect(transport.deadLetters[0].envelope.id).toBe(envelope.id);
    expect(transport.deadLetters[0].reason).toBe('Retries exhausted after 3 attempt(s): smtp down');
    expect(failed).toHaveBeenCalledWith(expect.objectContaining({ exhausted: true }));
    expect(pool.getStats()).toMatchObject({ processed: 3, retried: 2, failedPermanently: 1, succeeded: 0 });
    expect(transport.inFlightCount).toBe(0);
  });

  it('dead-letters fatal outcomes without redelivery', async () => {
    const { transport, dispatcher, pool } = harness(async () => TaskOutcome.fatal('Booking does not exist'));

    pool.start(1);
    await dispatcher.enqueue('count', { n: 1 });
    await waitFor(() => pool.getStats().failedPermanently === 1);

    expect(transport.redeliveries).toEqual([]);
    expect(transport.deadLetters[0].reason).toBe('Booking does not exist');
  });

  it('classifies errors thrown by handlers instead of crashing the context', async () => {
    let calls = 0;
    const { transport, dispatcher, pool } = harness(async () => {
      calls++;
      if (calls === 1) throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
      throw new Error('Listing not found');
    });

    pool.start(1);
    await dispatcher.enqueue('count', { n: 1 });
    await waitFor(() => pool.getStats().failedPermanently === 1);

    expect(calls).toBe(2);
    expect(pool.getStats().retried).toBe(1);
    expect(transport.deadLetters[0].reason).toBe('Listing not found');
  });

  it('rejects deliveries whose task has no handler without requeueing them', async () => {
    const handler = vi.fn(async () => TaskOutcome.success());
    const { transport, pool } = harness(handler);
    const unresolved = vi.fn();
    pool.on('task-unresolved', unresolved);

    pool.start(1);
    await transport.enqueue(createEnvelope({ taskName: 'unknown_task', queue: 'emails', payload: {}, maxRetries: 3 }));
    await waitFor(() => pool.getStats().unresolved === 1);

    expect(handler).not.toHaveBeenCalled();
    expect(unresolved).toHaveBeenCalledWith(
      expect.objectContaining({ reason: 'No handler registered for unknown_task' })
    );
    expect(transport.pendingCount('emails')).toBe(0);
    expect(transport.inFlightCount).toBe(0);
    expect(transport.deadLetters).toEqual([]);
  });

  it('hands the delivery back when the redelivery cannot be scheduled', async () => {
    class FlakyTransport extends InMemoryTransport {
      failures = 1;

      async scheduleRedelivery(envelope: TaskEnvelope, delayMs: number): Promise<void> {
        if (this.failures-- > 0) throw new BrokerUnavailableError('Broker is unavailable');
        return super.scheduleRedelivery(envelope, delayMs);
      }
    }

    const attempts: number[] = [];
    const { pool, dispatcher } = harness(async (_payload, context) => {
      attempts.push(context.envelope.attempt);
      return attempts.length === 1 ? TaskOutcome.retryable('smtp down') : TaskOutcome.success();
    }, new FlakyTransport({ delayFactor: 0, logger: testLogger }));

    pool.start(1);
    await dispatcher.enqueue('count', { n: 1 });
    await waitFor(() => pool.getStats().succeeded === 1);

    expect(attempts).toEqual([0, 0]);
    expect(pool.getStats().retried).toBe(1);
  });

  it('returns a delivery to the queue when its dead letter cannot be stored', async () => {
    const attempts: number[] = [];
    const { transport, dispatcher, pool } = harness(async (_payload, context) => {
      attempts.push(context.envelope.attempt);
      return TaskOutcome.fatal('Booking does not exist');
    });
    vi.spyOn(transport, 'deadLetter').mockRejectedValueOnce(new BrokerUnavailableError('Broker is unavailable'));
    const contextErrors = vi.fn();
    pool.on('context-error', contextErrors);

    pool.start(1);
    await dispatcher.enqueue('count', { n: 1 });
    await waitFor(() => pool.getStats().failedPermanently === 1);

    expect(attempts).toEqual([0, 0]);
    expect(contextErrors).toHaveBeenCalledTimes(1);
    expect(transport.deadLetters.map(record => record.reason)).toEqual(['Booking does not exist']);
    expect(transport.inFlightCount).toBe(0);
    expect(transport.pendingCount('emails')).toBe(0);
  });

  it('acks every envelope exactly once across concurrent contexts', async () => {
    const seen = new Map<number, number>();
    const { transport, dispatcher, pool } = harness(async payload => {
      await new Promise(resolve => setImmediate(resolve));
      seen.set(payload.n, (seen.get(payload.n) ?? 0) + 1);
      return TaskOutcome.success();
    });

    pool.start(4);
    await Promise.all(Array.from({ length: 50 }, (_, n) => dispatcher.enqueue('count', { n })));
    await waitFor(() => pool.getStats().processed === 50);

    expect(seen.size).toBe(50);
    expect([...seen.values()].every(count => count === 1)).toBe(true);
    expect(pool.getStats()).toMatchObject({ contexts: 4, succeeded: 50, inFlight: 0 });
    expect(transport.pendingCount('emails')).toBe(0);
    expect(transport.inFlightCount).toBe(0);
  });

  it('lets in-flight tasks finish within the grace period', async () => {
    const { transport, dispatcher, pool } = harness(async () => {
      await new Promise(resolve => setTimeout(resolve, 30));
      return TaskOutcome.success();
    });

    pool.start(1);
    await dispatcher.enqueue('count', { n: 1 });
    await waitFor(() => pool.getStats().inFlight === 1);
    await pool.stop(1000);

    expect(pool.getStats()).toMatchObject({ running: false, succeeded: 1, abandoned: 0 });
    expect(transport.inFlightCount).toBe(0);
  });

  it('abandons tasks still running at the deadline and requeues them', async () => {
    let signal: AbortSignal | undefined;
    const { transport, dispatcher, pool } = harness(
      (_payload, context) =>
        new Promise<TaskOutcome>(() => {
          signal = context.signal;
        })
    );
    const stopped = vi.fn();
    pool.on('stopped', stopped);

    pool.start(1);
    await dispatcher.enqueue('count', { n: 1 });
    await waitFor(() => pool.getStats().inFlight === 1);
    await pool.stop(20);

    expect(signal?.aborted).toBe(true);
    expect(pool.getStats()).toMatchObject({ abandoned: 1, inFlight: 0, contexts: 0 });
    expect(transport.pendingCount('emails')).toBe(1);
    expect(transport.inFlightCount).toBe(0);
    expect(stopped).toHaveBeenCalledTimes(1);
  });

  it('validates how it is started', () => {
    const { pool } = harness(async () => TaskOutcome.success());

    expect(() => pool.start(0)).toThrow(PoolStateError);
    pool.start(1);
    expect(() => pool.start(1)).toThrow('Worker pool is already running');
  });

  it('needs one context per configured queue', () => {
    const transport = new InMemoryTransport({ logger: testLogger });
    const registry = new TaskRegistryBuilder(testLogger).build();
    const pool = new WorkerPool(transport, registry, new RetryScheduler(transport), {
      queues: ['emails', 'payments'],
      logger: testLogger,
    });

    expect(() => pool.start(1)).toThrow(PoolStateError);
    expect(() => new WorkerPool(transport, registry, new RetryScheduler(transport), { queues: [] })).toThrow(
      'Worker pool needs at least one queue'
    );
  });
});
