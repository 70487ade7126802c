import { describe, expect, it } from 'vitest';
import { loadSettings } from '../../shared/config/settings';
import { getNotificationRetryPolicies } from '../../shared/queues/types/queue-configs';
import { TASK_NAMES } from '../../shared/queues/types/task-types';

describe('loadSettings', () => {
  it('falls back to local development defaults', () => {
    const settings = loadSettings({});

    expect(settings.environment).toBe('development');
    expect(settings.broker).toEqual({
      driver: 'bullmq',
      redis: { host: 'localhost', port: 6379, password: undefined, db: 3 },
      enqueueAttempts: 3,
      enqueueRetryDelayMs: 200,
    });
    expect(settings.worker).toEqual({
      queues: ['emails'],
      concurrency: 4,
      graceMs: 30000,
      maxDelaySeconds: 600,
      maxRetries: 3,
      retryDelaySeconds: 60,
    });
    expect(settings.email.from).toBe('no-reply@localhost');
    expect(settings.payment.webhookSecret).toBeUndefined();
  });

  it('reads values from the environment', () => {
    const settings = loadSettings({
      NODE_ENV: 'production',
      BROKER_DRIVER: 'memory',
      REDIS_PORT: '6380',
      WORKER_QUEUES: 'emails, reports ,',
      WORKER_CONCURRENCY: '8',
      EMAIL_USE_SSL: 'true',
      EMAIL_HOST_USER: 'mailer@example.com',
      CHAPA_WEBHOOK_SECRET: 'test-secret',
    });

    expect(settings.environment).toBe('production');
    expect(settings.broker.driver).toBe('memory');
    expect(settings.broker.redis.port).toBe(6380);
    expect(settings.worker.queues).toEqual(['emails', 'reports']);
    expect(settings.worker.concurrency).toBe(8);
    expect(settings.email.secure).toBe(true);
    expect(settings.email.from).toBe('mailer@example.com');
    expect(settings.payment.webhookSecret).toBe('test-secret');
  });

  it('ignores unparseable numbers and clamps counts to at least one', () => {
    const settings = loadSettings({ REDIS_PORT: 'redis', WORKER_CONCURRENCY: '0', ENQUEUE_ATTEMPTS: '-2' });

    expect(settings.broker.redis.port).toBe(6379);
    expect(settings.worker.concurrency).toBe(1);
    expect(settings.broker.enqueueAttempts).toBe(1);
  });

  it('rejects unknown broker drivers', () => {
    expect(() => loadSettings({ BROKER_DRIVER: 'rabbitmq' })).toThrow('Unsupported BROKER_DRIVER: rabbitmq');
  });
});

describe('getNotificationRetryPolicies', () => {
  it('applies worker retry settings to every notification task', () => {
    const policies = getNotificationRetryPolicies({ maxRetries: 5, retryDelaySeconds: 30 });

    expect(policies[TASK_NAMES.PAYMENT_FAILED]).toEqual({
      maxRetries: 5,
      baseDelaySeconds: 30,
      backoffStrategy: 'exponential',
    });
    expect(Object.keys(policies).sort()).toEqual(Object.values(TASK_NAMES).sort());
  });
});
