/**
 * Payment Reconciliation - Gateway Adapter
 *
 * Verifies transaction references with the payment provider and turns the
 * first terminal result into exactly one notification task.
 *
 * State per reference: pending -> confirmed | failed. Terminal results are
 * stored before anything is enqueued; once stored, the provider is never asked
 * about that reference again. The notified marker is claimed before enqueue
 * and released when enqueue fails, so a later verification or webhook replay
 * can try again.
 */

import { z } from 'zod';
import { Logger } from '../logging/logger';
import type { Dispatcher } from '../queues/core/Dispatcher';
import { TASK_NAMES, type NotificationPayloads } from '../queues/types/task-types';
import type { PaymentProvider } from './ChapaClient';
import { UnknownTransactionError, WebhookPayloadError, WebhookSignatureError } from './errors';
import type { ReconciliationRecord, ReconciliationResult, ReconciliationStore } from './ReconciliationStore';
import { ReferenceLocker } from './ReferenceLocker';
import { verifyWebhookSignatures, type WebhookSignatures } from './signature';

export type NotificationState = 'queued' | 'already-sent' | 'deferred' | 'none';

export interface VerificationReport {
  transactionRef: string;
  status: 'pending' | ReconciliationResult['status'];
  paymentId: string;
  bookingId: string;
  result?: ReconciliationResult;
  notification: NotificationState;
}

export interface ReconciliationGatewayOptions {
  webhookSecret?: string;
  logger?: Logger;
}

const webhookBodySchema = z
  .object({
    tx_ref: z.string().min(1),
    status: z.string().optional(),
  })
  .passthrough();

export class ReconciliationGateway {
  private readonly locker = new ReferenceLocker();
  private readonly webhookSecret?: string;
  private logger: Logger;

  constructor(
    private readonly store: ReconciliationStore,
    private readonly provider: PaymentProvider,
    private readonly dispatcher: Dispatcher<NotificationPayloads>,
    options: ReconciliationGatewayOptions = {}
  ) {
    this.webhookSecret = options.webhookSecret;
    this.logger = options.logger ?? new Logger('payment-reconciliation');
  }

  /**
   * Verify a transaction reference and, on its first terminal result, enqueue
   * the matching notification.
   */
  async verify(transactionRef: string): Promise<VerificationReport> {
    return this.locker.run(transactionRef, async () => {
      let record = await this.store.findByReference(transactionRef);

      if (!record) {
        const payment = await this.store.findPayment(transactionRef);
        if (!payment) {
          throw new UnknownTransactionError(transactionRef);
        }

        const verification = await this.provider.verify(transactionRef);
        if (verification.status === 'pending') {
          this.logger.info(`Transaction ${transactionRef} is still pending`, { transactionRef });
          return {
            transactionRef,
            status: 'pending',
            paymentId: payment.paymentId,
            bookingId: payment.bookingId,
            notification: 'none',
          };
        }

        record = await this.store.recordTerminal({
          transactionRef,
          paymentId: payment.paymentId,
          bookingId: payment.bookingId,
          status: verification.status,
          providerReference: verification.providerReference,
          verifiedAt: new Date(),
        });
        this.logger.info(`Transaction ${transactionRef} reconciled as ${record.status}`, {
          transactionRef,
          status: record.status,
        });
      }

      const notification = await this.notify(record);
      return {
        transactionRef,
        status: record.status,
        paymentId: record.paymentId,
        bookingId: record.bookingId,
        result: toResult(record),
        notification,
      };
    });
  }

  /**
   * Handle a provider webhook. The body only names the reference; its status is
   * never trusted and the reference is always re-verified.
   */
  async handleWebhook(rawBody: Buffer | string, signatures: WebhookSignatures = {}): Promise<VerificationReport> {
    if (this.webhookSecret && !verifyWebhookSignatures(rawBody, signatures, this.webhookSecret)) {
      throw new WebhookSignatureError();
    }

    let body: unknown;
    try {
      body = JSON.parse(rawBody.toString());
    } catch (error) {
      throw new WebhookPayloadError('Webhook body is not valid JSON', { cause: error });
    }

    const parsed = webhookBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new WebhookPayloadError('Webhook body has no tx_ref');
    }

    this.logger.info(`Webhook received for ${parsed.data.tx_ref}: ${parsed.data.status ?? 'unknown'}`, {
      transactionRef: parsed.data.tx_ref,
    });
    return this.verify(parsed.data.tx_ref);
  }

  private async notify(record: ReconciliationRecord): Promise<NotificationState> {
    if (record.notifiedAt) {
      return 'already-sent';
    }

    const claimed = await this.store.claimNotification(record.transactionRef, new Date());
    if (!claimed) {
      return 'already-sent';
    }

    const taskName =
      record.status === 'confirmed' ? TASK_NAMES.PAYMENT_CONFIRMATION : TASK_NAMES.PAYMENT_FAILED;

    try {
      await this.dispatcher.enqueue(taskName, { paymentId: record.paymentId });
      return 'queued';
    } catch (error) {
      await this.store.releaseNotification(record.transactionRef);
      this.logger.logError(`Notification for ${record.transactionRef} deferred`, error, {
        transactionRef: record.transactionRef,
        taskName,
      });
      return 'deferred';
    }
  }
}

function toResult(record: ReconciliationRecord): ReconciliationResult {
  return {
    transactionRef: record.transactionRef,
    paymentId: record.paymentId,
    bookingId: record.bookingId,
    status: record.status,
    providerReference: record.providerReference,
    verifiedAt: record.verifiedAt,
  };
}
