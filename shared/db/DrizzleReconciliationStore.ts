import { and, eq, isNull } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type * as schema from './schema';
import { bookings, paymentReconciliations, payments } from './schema';
import type {
  PaymentReference,
  ReconciliationRecord,
  ReconciliationResult,
  ReconciliationStore,
} from '../payments/ReconciliationStore';

/**
 * Works over any postgres driver drizzle supports; production passes the
 * postgres-js database from `getDb`.
 */
export class DrizzleReconciliationStore<TQueryResult extends PgQueryResultHKT> implements ReconciliationStore {
  constructor(private readonly db: PgDatabase<TQueryResult, typeof schema>) {}

  async findPayment(transactionRef: string): Promise<PaymentReference | undefined> {
    const [row] = await this.db
      .select({
        paymentId: payments.id,
        bookingId: payments.bookingId,
        transactionRef: payments.transactionRef,
        status: payments.status,
      })
      .from(payments)
      .where(eq(payments.transactionRef, transactionRef))
      .limit(1);
    return row;
  }

  async findByReference(transactionRef: string): Promise<ReconciliationRecord | undefined> {
    const [row] = await this.db
      .select()
      .from(paymentReconciliations)
      .where(eq(paymentReconciliations.transactionRef, transactionRef))
      .limit(1);
    return row;
  }

  async recordTerminal(result: ReconciliationResult): Promise<ReconciliationRecord> {
    return this.db.transaction(async (tx) => {
      const [inserted] = await tx
        .insert(paymentReconciliations)
        .values({ ...result, notifiedAt: null })
        .onConflictDoNothing({ target: paymentReconciliations.transactionRef })
        .returning();

      if (!inserted) {
        const [existing] = await tx
          .select()
          .from(paymentReconciliations)
          .where(eq(paymentReconciliations.transactionRef, result.transactionRef))
          .limit(1);
        if (!existing) {
          throw new Error(`Reconciliation for ${result.transactionRef} vanished during upsert`);
        }
        return existing;
      }

      // First terminal transition: move the payment and booking along with it.
      const now = new Date();
      if (result.status === 'confirmed') {
        await tx
          .update(payments)
          .set({
            status: 'completed',
            transactionId: result.providerReference,
            paymentDate: result.verifiedAt,
            updatedAt: now,
          })
          .where(eq(payments.id, result.paymentId));
        await tx
          .update(bookings)
          .set({ status: 'confirmed', updatedAt: now })
          .where(eq(bookings.id, result.bookingId));
      } else {
        await tx
          .update(payments)
          .set({ status: 'failed', transactionId: result.providerReference, updatedAt: now })
          .where(eq(payments.id, result.paymentId));
      }

      return inserted;
    });
  }

  async claimNotification(transactionRef: string, at: Date): Promise<boolean> {
    const claimed = await this.db
      .update(paymentReconciliations)
      .set({ notifiedAt: at })
      .where(
        and(
          eq(paymentReconciliations.transactionRef, transactionRef),
          isNull(paymentReconciliations.notifiedAt)
        )
      )
      .returning({ transactionRef: paymentReconciliations.transactionRef });
    return claimed.length > 0;
  }

  async releaseNotification(transactionRef: string): Promise<void> {
    await this.db
      .update(paymentReconciliations)
      .set({ notifiedAt: null })
      .where(eq(paymentReconciliations.transactionRef, transactionRef));
  }
}
