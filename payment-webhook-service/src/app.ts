import express, { type NextFunction, type Request, type Response } from 'express';
import { Logger } from '../../shared/logging/logger';
import {
  PaymentProviderError,
  UnknownTransactionError,
  WebhookPayloadError,
  WebhookSignatureError,
} from '../../shared/payments/errors';
import type { ReconciliationGateway, VerificationReport } from '../../shared/payments/ReconciliationGateway';

const SERVICE_NAME = 'payment-webhook-service';

export const createLoggerMiddleware = (logger: Logger) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.debug(`${req.method} ${req.path} ${res.statusCode}`, { durationMs: Date.now() - startedAt });
    });
    next();
  };
};

function summarize(report: VerificationReport) {
  return {
    transactionRef: report.transactionRef,
    status: report.status,
    bookingId: report.bookingId,
    paymentId: report.paymentId,
    verifiedAt: report.result?.verifiedAt.toISOString(),
    notification: report.notification,
  };
}

function sendError(res: Response, error: unknown, logger: Logger): void {
  if (error instanceof WebhookSignatureError) {
    res.status(401).json({ message: error.message });
    return;
  }
  if (error instanceof WebhookPayloadError) {
    res.status(400).json({ message: error.message });
    return;
  }
  if (error instanceof UnknownTransactionError) {
    res.status(404).json({ message: error.message });
    return;
  }
  if (error instanceof PaymentProviderError) {
    logger.logError('Payment provider error', error);
    res.status(error.transient ? 503 : 502).json({ message: 'Payment verification failed' });
    return;
  }

  logger.logError('Unhandled reconciliation error', error);
  res.status(500).json({ message: 'Internal server error' });
}

export function createPaymentWebhookApp(
  gateway: ReconciliationGateway,
  logger: Logger = new Logger(SERVICE_NAME)
): express.Express {
  const app = express();
  app.use(createLoggerMiddleware(logger));

  // ==========================================
  // PAYMENT PROVIDER WEBHOOK
  // ==========================================

  // Raw body: x-chapa-signature covers the exact bytes the provider sent.
  app.post(
    '/api/payments/webhook',
    express.raw({ type: '*/*', limit: '64kb' }),
    async (req: Request, res: Response): Promise<void> => {
      const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const signatures = { body: req.get('x-chapa-signature'), secret: req.get('chapa-signature') };

      try {
        const report = await gateway.handleWebhook(rawBody, signatures);

        if (report.notification === 'deferred') {
          // Not acknowledged, so the provider delivers the webhook again.
          res.status(503).json({ message: 'Notification could not be queued', ...summarize(report) });
          return;
        }

        res.status(200).json({ message: 'Webhook processed successfully', ...summarize(report) });
      } catch (error) {
        sendError(res, error, logger);
      }
    }
  );

  // ==========================================
  // VERIFICATION
  // ==========================================

  app.get('/api/payments/verify/:txRef', async (req: Request, res: Response): Promise<void> => {
    try {
      const report = await gateway.verify(req.params.txRef);
      res.status(200).json(summarize(report));
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  app.get('/health', (_req: Request, res: Response): void => {
    res.json({ status: 'ok', service: SERVICE_NAME, timestamp: new Date().toISOString() });
  });

  return app;
}
