/**
 * Notification Dispatch - Queue Configuration
 *
 * Defaults for retry policies, broker connection and worker behaviour.
 */

import type { RedisOptions } from 'ioredis';
import type { RetryPolicy } from './interfaces';
import type { RedisSettings, WorkerSettings } from '../../config/settings';
import { TASK_NAMES, type NotificationTaskName } from './task-types';

// =============================================
// Envelope Limits
// =============================================

export const ENVELOPE_SCHEMA_VERSION = 1;
export const ENVELOPE_CONTENT_TYPE = 'application/json';
export const MAX_ENVELOPE_BYTES = 8 * 1024;

// =============================================
// Retry Defaults
// =============================================

export const DEFAULT_MAX_DELAY_SECONDS = 600;

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxRetries: 3,
  baseDelaySeconds: 60,
  backoffStrategy: 'exponential',
});

/**
 * Retry policy for every notification task, derived from worker settings.
 */
export function getNotificationRetryPolicies(
  worker?: Pick<WorkerSettings, 'maxRetries' | 'retryDelaySeconds'>
): Record<NotificationTaskName, RetryPolicy> {
  const policy: RetryPolicy = worker
    ? Object.freeze({
        ...DEFAULT_RETRY_POLICY,
        maxRetries: worker.maxRetries,
        baseDelaySeconds: worker.retryDelaySeconds,
      })
    : DEFAULT_RETRY_POLICY;

  return {
    [TASK_NAMES.BOOKING_CONFIRMATION]: policy,
    [TASK_NAMES.PAYMENT_CONFIRMATION]: policy,
    [TASK_NAMES.PAYMENT_FAILED]: policy,
  };
}

// =============================================
// Broker Connection
// =============================================

export const BULLMQ_PREFIX = 'travel';
export const DEAD_LETTER_SUFFIX = '-dlq';

/**
 * Long enough for the slowest handler; a delivery whose lock expires is
 * treated as stalled and redelivered.
 */
export const DELIVERY_LOCK_MS = 10 * 60 * 1000;

/**
 * Stalls a job may go through before BullMQ fails it outright. Envelopes are
 * dead-lettered by the retry scheduler, never by the stalled check.
 */
export const MAX_STALLED_COUNT = Number.MAX_SAFE_INTEGER;

export const DEFAULT_CONNECTION_OPTIONS: RedisOptions = {
  family: 4,
  connectTimeout: 10000,
  enableReadyCheck: true,
  keepAlive: 30000,
};

/**
 * Producer connections fail fast so enqueue can report the broker as
 * unavailable instead of buffering commands while Redis is down.
 */
export function buildProducerOptions(redis: RedisSettings): RedisOptions {
  return {
    ...DEFAULT_CONNECTION_OPTIONS,
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
  };
}

/**
 * Consumer connections block on Redis and must retry forever; BullMQ refuses
 * worker connections with a request retry limit.
 */
export function buildConsumerOptions(redis: RedisSettings): RedisOptions {
  return {
    ...DEFAULT_CONNECTION_OPTIONS,
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
    maxRetriesPerRequest: null,
  };
}
