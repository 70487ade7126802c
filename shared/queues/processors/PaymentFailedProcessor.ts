import { TaskOutcome, type TaskContext } from '../types/interfaces';
import type { PaymentNotificationData } from '../types/task-types';
import { paymentFailedEmail } from '../../email/templates';
import { NotificationProcessor } from './NotificationProcessor';

export class PaymentFailedProcessor extends NotificationProcessor<PaymentNotificationData> {
  async process(payload: PaymentNotificationData, context: TaskContext): Promise<TaskOutcome> {
    const payment = await this.repository.findPaymentNotice(payload.paymentId);
    if (!payment) {
      return TaskOutcome.fatal(`Payment ${payload.paymentId} does not exist`);
    }

    if (payment.status !== 'failed') {
      context.logger.info(`Payment ${payment.paymentId} is ${payment.status}, skipping failure email`);
      return TaskOutcome.success();
    }

    return this.deliver(
      paymentFailedEmail({
        bookingId: payment.booking.bookingId,
        guest: payment.booking.guest,
        amount: payment.amount,
        currency: payment.currency,
      }),
      context
    );
  }
}
