/**
 * Payment Reconciliation - Error Types
 */

export class PaymentProviderError extends Error {
  readonly code: string = 'PAYMENT_PROVIDER_ERROR';

  constructor(
    message: string,
    readonly transient: boolean,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownTransactionError extends PaymentProviderError {
  readonly code: string = 'UNKNOWN_TRANSACTION';

  constructor(readonly transactionRef: string, statusCode?: number) {
    super(`Unknown transaction reference: ${transactionRef}`, false, statusCode);
  }
}

export class WebhookSignatureError extends Error {
  readonly code = 'INVALID_WEBHOOK_SIGNATURE';

  constructor(message: string = 'Webhook signature mismatch') {
    super(message);
    this.name = 'WebhookSignatureError';
  }
}

export class WebhookPayloadError extends Error {
  readonly code = 'INVALID_WEBHOOK_PAYLOAD';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WebhookPayloadError';
  }
}
