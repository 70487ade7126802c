import type { PaymentStatus } from '../db/schema';

export type ReconciliationStatus = 'confirmed' | 'failed';

export interface ReconciliationResult {
  transactionRef: string;
  paymentId: string;
  bookingId: string;
  status: ReconciliationStatus;
  providerReference: string | null;
  verifiedAt: Date;
}

export interface ReconciliationRecord extends ReconciliationResult {
  notifiedAt: Date | null;
}

export interface PaymentReference {
  paymentId: string;
  bookingId: string;
  transactionRef: string;
  status: PaymentStatus;
}

/**
 * Persistence for reconciliation state. Implementations must make
 * `recordTerminal` and `claimNotification` atomic across processes.
 */
export interface ReconciliationStore {
  findPayment(transactionRef: string): Promise<PaymentReference | undefined>;
  findByReference(transactionRef: string): Promise<ReconciliationRecord | undefined>;

  /**
   * Store the first terminal result for a reference. When one already exists it
   * is returned unchanged and no side effects run again.
   */
  recordTerminal(result: ReconciliationResult): Promise<ReconciliationRecord>;

  /** Resolves true only for the caller that set the notified marker. */
  claimNotification(transactionRef: string, at: Date): Promise<boolean>;
  releaseNotification(transactionRef: string): Promise<void>;
}
