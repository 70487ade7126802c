/**
 * Notification Dispatch - Task Names and Payloads
 *
 * Each notification task carries only the identifier of the entity it is
 * about. Handlers re-read everything else from the system of record.
 */

import { z } from 'zod';

export const TASK_NAMES = {
  BOOKING_CONFIRMATION: 'send_booking_confirmation_email',
  PAYMENT_CONFIRMATION: 'send_payment_confirmation_email',
  PAYMENT_FAILED: 'send_payment_failed_email',
} as const;

export type NotificationTaskName = (typeof TASK_NAMES)[keyof typeof TASK_NAMES];

export const EMAIL_QUEUE = 'emails';

export const bookingNotificationSchema = z.object({
  bookingId: z.string().min(1),
});

export const paymentNotificationSchema = z.object({
  paymentId: z.string().min(1),
});

export type BookingNotificationData = z.infer<typeof bookingNotificationSchema>;
export type PaymentNotificationData = z.infer<typeof paymentNotificationSchema>;

/**
 * Payload type per task name, used by the dispatcher for typed calls.
 */
export type NotificationPayloads = {
  [TASK_NAMES.BOOKING_CONFIRMATION]: BookingNotificationData;
  [TASK_NAMES.PAYMENT_CONFIRMATION]: PaymentNotificationData;
  [TASK_NAMES.PAYMENT_FAILED]: PaymentNotificationData;
};
