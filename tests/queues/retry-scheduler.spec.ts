import { describe, expect, it, vi } from 'vitest';
import { RetryScheduler, computeRedeliveryDelay } from '../../shared/queues/core/RetryScheduler';
import { createEnvelope, nextAttempt } from '../../shared/queues/core/TaskEnvelope';
import { TaskOutcome, type RetryPolicy, type TaskEnvelope } from '../../shared/queues/types/interfaces';

const exponential: RetryPolicy = { maxRetries: 5, baseDelaySeconds: 60, backoffStrategy: 'exponential' };
const fixed: RetryPolicy = { maxRetries: 5, baseDelaySeconds: 30, backoffStrategy: 'fixed' };

function envelopeAt(attempt: number, maxRetries = 5): TaskEnvelope {
  let envelope = createEnvelope({ taskName: 'send_payment_failed_email', queue: 'emails', payload: {}, maxRetries });
  for (let i = 0; i < attempt; i++) envelope = nextAttempt(envelope);
  return envelope;
}

describe('computeRedeliveryDelay', () => {
  it('doubles the base delay per attempt for exponential backoff', () => {
    expect([0, 1, 2].map(attempt => computeRedeliveryDelay(attempt, exponential))).toEqual([60, 120, 240]);
  });

  it('grows linearly for fixed backoff', () => {
    expect([0, 1, 2].map(attempt => computeRedeliveryDelay(attempt, fixed))).toEqual([30, 60, 90]);
  });

  it('caps the delay at the ceiling', () => {
    expect(computeRedeliveryDelay(4, exponential)).toBe(600);
    expect(computeRedeliveryDelay(3, exponential, 300)).toBe(300);
  });
});

describe('RetryScheduler', () => {
  const scheduler = new RetryScheduler({ scheduleRedelivery: vi.fn() });

  it('acks on success', () => {
    expect(scheduler.decide(envelopeAt(0), exponential, TaskOutcome.success())).toEqual({ action: 'ack' });
  });

  it('dead-letters fatal failures without retrying', () => {
    expect(scheduler.decide(envelopeAt(0), exponential, TaskOutcome.fatal('gone'))).toEqual({
      action: 'dead-letter',
      reason: 'gone',
      exhausted: false,
    });
  });

  it('redelivers a retryable failure as the next attempt', () => {
    const envelope = envelopeAt(1);
    const decision = scheduler.decide(envelope, exponential, TaskOutcome.retryable('smtp down'));

    expect(decision.action).toBe('redeliver');
    if (decision.action !== 'redeliver') return;
    expect(decision.delaySeconds).toBe(120);
    expect(decision.envelope.attempt).toBe(2);
    expect(decision.envelope.id).toBe(envelope.id);
  });

  it('treats a retryable failure on the last attempt as exhausted', () => {
    const decision = scheduler.decide(envelopeAt(2, 3), exponential, TaskOutcome.retryable('smtp down'));
    expect(decision).toEqual({
      action: 'dead-letter',
      reason: 'Retries exhausted after 3 attempt(s): smtp down',
      exhausted: true,
    });
  });

  it('allows exactly one attempt when maxRetries is zero', () => {
    const decision = scheduler.decide(envelopeAt(0, 0), exponential, TaskOutcome.retryable('smtp down'));
    expect(decision).toMatchObject({ action: 'dead-letter', exhausted: true });
  });

  it('reads the attempt budget from the envelope, not the policy', () => {
    const decision = scheduler.decide(envelopeAt(1, 2), exponential, TaskOutcome.retryable('x'));
    expect(decision.action).toBe('dead-letter');
  });

  it('publishes redeliveries in milliseconds through the injected scheduler', async () => {
    const scheduleRedelivery = vi.fn(async () => undefined);
    const withCeiling = new RetryScheduler({ scheduleRedelivery }, { maxDelaySeconds: 90 });
    const decision = withCeiling.decide(envelopeAt(1), exponential, TaskOutcome.retryable('x'));

    await withCeiling.schedule(decision);
    await withCeiling.schedule({ action: 'ack' });

    expect(scheduleRedelivery).toHaveBeenCalledTimes(1);
    expect(scheduleRedelivery).toHaveBeenCalledWith(expect.objectContaining({ attempt: 2 }), 90000);
  });
});
