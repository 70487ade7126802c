/**
 * Notification Dispatch - Retry Scheduler
 *
 * Turns the outcome of one attempt into a decision: acknowledge, redeliver
 * later through the broker's delay mechanism, or dead-letter. Workers never
 * sleep between attempts.
 */

import type {
  RedeliveryScheduler,
  RetryDecision,
  RetryPolicy,
  TaskEnvelope,
  TaskOutcome,
} from '../types/interfaces';
import { DEFAULT_MAX_DELAY_SECONDS } from '../types/queue-configs';
import { nextAttempt } from './TaskEnvelope';

export interface RetrySchedulerOptions {
  maxDelaySeconds?: number;
}

/**
 * Delay before the delivery following `attempt`, in seconds.
 */
export function computeRedeliveryDelay(
  attempt: number,
  policy: RetryPolicy,
  maxDelaySeconds: number = DEFAULT_MAX_DELAY_SECONDS
): number {
  const delay =
    policy.backoffStrategy === 'exponential'
      ? policy.baseDelaySeconds * 2 ** attempt
      : policy.baseDelaySeconds * (attempt + 1);
  return Math.min(delay, maxDelaySeconds);
}

export class RetryScheduler {
  private readonly maxDelaySeconds: number;

  constructor(
    private readonly redelivery: RedeliveryScheduler,
    options: RetrySchedulerOptions = {}
  ) {
    this.maxDelaySeconds = options.maxDelaySeconds ?? DEFAULT_MAX_DELAY_SECONDS;
  }

  decide(envelope: TaskEnvelope, policy: RetryPolicy, outcome: TaskOutcome): RetryDecision {
    switch (outcome.kind) {
      case 'success':
        return { action: 'ack' };
      case 'fatal':
        return { action: 'dead-letter', reason: outcome.reason, exhausted: false };
      case 'retryable': {
        if (envelope.attempt + 1 >= envelope.maxRetries) {
          return {
            action: 'dead-letter',
            reason: `Retries exhausted after ${envelope.attempt + 1} attempt(s): ${outcome.reason}`,
            exhausted: true,
          };
        }
        return {
          action: 'redeliver',
          envelope: nextAttempt(envelope),
          delaySeconds: computeRedeliveryDelay(envelope.attempt, policy, this.maxDelaySeconds),
        };
      }
    }
  }

  /**
   * Publish the redelivery a decision calls for. Other decisions are settled by
   * the worker against its own delivery handle.
   */
  async schedule(decision: RetryDecision): Promise<void> {
    if (decision.action !== 'redeliver') return;
    await this.redelivery.scheduleRedelivery(decision.envelope, decision.delaySeconds * 1000);
  }
}
