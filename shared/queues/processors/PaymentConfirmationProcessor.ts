import { TaskOutcome, type TaskContext } from '../types/interfaces';
import type { PaymentNotificationData } from '../types/task-types';
import { paymentConfirmationEmail } from '../../email/templates';
import { NotificationProcessor } from './NotificationProcessor';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Nights between two `YYYY-MM-DD` dates.
 */
export function nightsBetween(startDate: string, endDate: string): number {
  const span = Date.parse(`${endDate}T00:00:00Z`) - Date.parse(`${startDate}T00:00:00Z`);
  return Number.isNaN(span) ? 0 : Math.max(0, Math.round(span / DAY_MS));
}

export class PaymentConfirmationProcessor extends NotificationProcessor<PaymentNotificationData> {
  async process(payload: PaymentNotificationData, context: TaskContext): Promise<TaskOutcome> {
    const payment = await this.repository.findPaymentNotice(payload.paymentId);
    if (!payment) {
      return TaskOutcome.fatal(`Payment ${payload.paymentId} does not exist`);
    }

    // The payment may have been reversed between dispatch and delivery.
    if (payment.status !== 'completed') {
      context.logger.info(`Payment ${payment.paymentId} is ${payment.status}, skipping confirmation email`);
      return TaskOutcome.success();
    }

    const { booking } = payment;
    const message = paymentConfirmationEmail({
      bookingId: booking.bookingId,
      guest: booking.guest,
      property: booking.property,
      checkIn: booking.startDate,
      checkOut: booking.endDate,
      nights: nightsBetween(booking.startDate, booking.endDate),
      amount: payment.amount,
      currency: payment.currency,
      transactionId: payment.transactionId ?? payment.transactionRef,
      paidAt: payment.paymentDate ?? payment.updatedAt,
    });

    return this.deliver(message, context);
  }
}
