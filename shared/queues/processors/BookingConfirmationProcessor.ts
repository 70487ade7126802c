import { TaskOutcome, type TaskContext } from '../types/interfaces';
import type { BookingNotificationData } from '../types/task-types';
import { bookingConfirmationEmail } from '../../email/templates';
import { NotificationProcessor } from './NotificationProcessor';

export class BookingConfirmationProcessor extends NotificationProcessor<BookingNotificationData> {
  async process(payload: BookingNotificationData, context: TaskContext): Promise<TaskOutcome> {
    const booking = await this.repository.findBookingNotice(payload.bookingId);
    if (!booking) {
      return TaskOutcome.fatal(`Booking ${payload.bookingId} does not exist`);
    }

    if (booking.status === 'cancelled') {
      context.logger.info(`Booking ${booking.bookingId} was cancelled, skipping confirmation email`);
      return TaskOutcome.success();
    }

    const message = bookingConfirmationEmail({
      bookingId: booking.bookingId,
      guest: booking.guest,
      property: booking.property,
      host: booking.host,
      checkIn: booking.startDate,
      checkOut: booking.endDate,
      totalPrice: booking.totalPrice,
    });

    return this.deliver(message, context);
  }
}
