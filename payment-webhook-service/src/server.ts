import { loadSettings } from '../../shared/config/settings';
import { Logger } from '../../shared/logging/logger';
import { getDb, closeDatabaseConnection } from '../../shared/db/connection';
import { DrizzleReconciliationStore } from '../../shared/db/DrizzleReconciliationStore';
import { createChapaClient } from '../../shared/payments/ChapaClient';
import { ReconciliationGateway } from '../../shared/payments/ReconciliationGateway';
import { closeRedisConnections } from '../../shared/redis/connection';
import { createNotificationDispatcher, createTransport } from '../../shared/queues/setup/notification-setup';
import { createPaymentWebhookApp } from './app';

const logger = new Logger('payment-webhook-service');

function main(): void {
  const settings = loadSettings();
  const db = getDb(settings.database);

  // This process only dispatches; notification-worker executes the tasks.
  const transport = createTransport(settings);
  const dispatcher = createNotificationDispatcher(settings, transport);

  const gateway = new ReconciliationGateway(
    new DrizzleReconciliationStore(db),
    createChapaClient(settings.payment),
    dispatcher,
    { webhookSecret: settings.payment.webhookSecret }
  );

  if (!settings.payment.webhookSecret) {
    logger.warn('CHAPA_WEBHOOK_SECRET is not set; webhook signatures are not checked');
  }

  const app = createPaymentWebhookApp(gateway, logger);
  const server = app.listen(settings.payment.webhookPort, () => {
    logger.info(`Payment webhook service running on http://localhost:${settings.payment.webhookPort}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      transport
        .close()
        .then(() => closeRedisConnections())
        .then(() => closeDatabaseConnection())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.logError('Error during shutdown', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
