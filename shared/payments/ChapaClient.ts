/**
 * Payment Reconciliation - Chapa Client
 *
 * Verifies transaction references against the Chapa API. Only verification is
 * supported; payment initialization and checkout redirects live elsewhere.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { PaymentSettings } from '../config/settings';
import { Logger } from '../logging/logger';
import { PaymentProviderError, UnknownTransactionError } from './errors';

export type ProviderStatus = 'confirmed' | 'failed' | 'pending';

export interface ProviderVerification {
  transactionRef: string;
  status: ProviderStatus;
  providerReference: string | null;
  amount?: string;
  currency?: string;
}

export interface PaymentProvider {
  verify(transactionRef: string): Promise<ProviderVerification>;
}

const verifyResponseSchema = z.object({
  status: z.string(),
  message: z.unknown().optional(),
  data: z
    .object({
      tx_ref: z.string().optional(),
      status: z.string(),
      reference: z.string().nullish(),
      amount: z.union([z.string(), z.number()]).nullish(),
      currency: z.string().nullish(),
    })
    .passthrough()
    .nullish(),
});

export function toProviderStatus(status: string): ProviderStatus {
  switch (status.trim().toLowerCase()) {
    case 'success':
      return 'confirmed';
    case 'failed':
      return 'failed';
    default:
      return 'pending';
  }
}

// =============================================
// Circuit Breaker
// =============================================

class CircuitBreaker {
  private failures = 0;
  private lastFailureTime = 0;
  private state: 'closed' | 'open' | 'half-open' = 'closed';

  constructor(
    private threshold: number = 5,
    private cooldownMs: number = 60000
  ) {}

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      if (Date.now() - this.lastFailureTime > this.cooldownMs) {
        this.state = 'half-open';
      } else {
        throw new PaymentProviderError('Payment provider circuit is open', true);
      }
    }

    try {
      const result = await operation();
      this.failures = 0;
      this.state = 'closed';
      return result;
    } catch (error) {
      // Only outages count towards opening the circuit.
      if (error instanceof PaymentProviderError && error.transient) {
        this.failures++;
        this.lastFailureTime = Date.now();
        if (this.failures >= this.threshold) {
          this.state = 'open';
        }
      }
      throw error;
    }
  }
}

// =============================================
// Chapa Client
// =============================================

export class ChapaClient implements PaymentProvider {
  private circuitBreaker = new CircuitBreaker();
  private logger: Logger;

  constructor(
    private readonly http: AxiosInstance,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('chapa-client');
  }

  async verify(transactionRef: string): Promise<ProviderVerification> {
    return this.circuitBreaker.execute(() => this.request(transactionRef));
  }

  private async request(transactionRef: string): Promise<ProviderVerification> {
    let body: unknown;
    try {
      const response = await this.http.get(`/transaction/verify/${encodeURIComponent(transactionRef)}`);
      body = response.data;
    } catch (error) {
      throw this.translateError(transactionRef, error);
    }

    const parsed = verifyResponseSchema.safeParse(body);
    if (!parsed.success || !parsed.data.data) {
      throw new PaymentProviderError(`Unexpected verification response for ${transactionRef}`, false);
    }

    const { data } = parsed.data;
    const verification: ProviderVerification = {
      transactionRef,
      status: toProviderStatus(data.status),
      providerReference: data.reference ?? null,
      amount: data.amount === null || data.amount === undefined ? undefined : String(data.amount),
      currency: data.currency ?? undefined,
    };

    this.logger.info(`Payment verification for ${transactionRef}: ${data.status}`, {
      transactionRef,
      status: verification.status,
    });
    return verification;
  }

  private translateError(transactionRef: string, error: unknown): PaymentProviderError {
    if (axios.isAxiosError(error)) {
      const statusCode = error.response?.status;
      if (statusCode === 404) {
        return new UnknownTransactionError(transactionRef, statusCode);
      }
      if (statusCode !== undefined && statusCode >= 400 && statusCode < 500 && statusCode !== 429) {
        return new PaymentProviderError(
          `Chapa rejected verification of ${transactionRef} (${statusCode})`,
          false,
          statusCode,
          { cause: error }
        );
      }
      return new PaymentProviderError(
        `Chapa unavailable verifying ${transactionRef}: ${statusCode ?? error.code ?? error.message}`,
        true,
        statusCode,
        { cause: error }
      );
    }

    return new PaymentProviderError(`Verification of ${transactionRef} failed: ${String(error)}`, true, undefined, {
      cause: error,
    });
  }
}

export function createChapaClient(settings: PaymentSettings, logger?: Logger): ChapaClient {
  const http = axios.create({
    baseURL: settings.baseURL,
    timeout: settings.timeoutMs,
    headers: {
      Authorization: `Bearer ${settings.secretKey}`,
      'Content-Type': 'application/json',
    },
  });
  return new ChapaClient(http, logger);
}
