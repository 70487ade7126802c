import { loadSettings } from '../../shared/config/settings';
import { Logger } from '../../shared/logging/logger';
import {
  setupNotificationQueues,
  shutdownNotificationQueues,
  type NotificationRuntime,
} from '../../shared/queues/setup/notification-setup';

const logger = new Logger('notification-worker');

async function initializeWorker(): Promise<void> {
  let runtime: NotificationRuntime;
  const settings = loadSettings();

  try {
    logger.info('Initializing notification worker...');
    runtime = await setupNotificationQueues(settings);
    logger.info('Notification worker ready');
  } catch (error) {
    logger.logError('Failed to initialize notification worker', error);
    process.exit(1);
  }

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down notification worker...`);

    try {
      await shutdownNotificationQueues(runtime, settings.worker.graceMs);
      process.exit(0);
    } catch (error) {
      logger.logError('Error during shutdown', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

initializeWorker().catch(error => {
  logger.logError('Notification worker crashed', error);
  process.exit(1);
});
