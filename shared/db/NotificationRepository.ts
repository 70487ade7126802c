/**
 * Read model for notification handlers: the current state of a booking or a
 * payment together with everything its email needs.
 */

import { eq } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import type { Database } from './connection';
import { bookings, listings, payments, users, type BookingStatus, type PaymentStatus } from './schema';

export interface Contact {
  firstName: string;
  lastName: string;
  email: string;
}

export interface BookingNotice {
  bookingId: string;
  status: BookingStatus;
  startDate: string;
  endDate: string;
  totalPrice: string;
  guest: Contact;
  property: { name: string; location: string };
  host: Contact & { phone: string | null };
}

export interface PaymentNotice {
  paymentId: string;
  status: PaymentStatus;
  amount: string;
  currency: string;
  transactionRef: string;
  transactionId: string | null;
  paymentDate: Date | null;
  updatedAt: Date;
  booking: {
    bookingId: string;
    startDate: string;
    endDate: string;
    guest: Contact;
    property: { name: string; location: string };
  };
}

export interface NotificationRepository {
  findBookingNotice(bookingId: string): Promise<BookingNotice | undefined>;
  findPaymentNotice(paymentId: string): Promise<PaymentNotice | undefined>;
}

export class DrizzleNotificationRepository implements NotificationRepository {
  constructor(private readonly db: Database) {}

  async findBookingNotice(bookingId: string): Promise<BookingNotice | undefined> {
    const host = alias(users, 'host');

    const [row] = await this.db
      .select({
        bookingId: bookings.id,
        status: bookings.status,
        startDate: bookings.startDate,
        endDate: bookings.endDate,
        totalPrice: bookings.totalPrice,
        guest: {
          firstName: users.firstName,
          lastName: users.lastName,
          email: users.email,
        },
        property: {
          name: listings.name,
          location: listings.location,
        },
        host: {
          firstName: host.firstName,
          lastName: host.lastName,
          email: host.email,
          phone: host.phoneNumber,
        },
      })
      .from(bookings)
      .innerJoin(users, eq(bookings.userId, users.id))
      .innerJoin(listings, eq(bookings.listingId, listings.id))
      .innerJoin(host, eq(listings.hostId, host.id))
      .where(eq(bookings.id, bookingId))
      .limit(1);

    return row;
  }

  async findPaymentNotice(paymentId: string): Promise<PaymentNotice | undefined> {
    const [row] = await this.db
      .select({
        paymentId: payments.id,
        status: payments.status,
        amount: payments.amount,
        currency: payments.currency,
        transactionRef: payments.transactionRef,
        transactionId: payments.transactionId,
        paymentDate: payments.paymentDate,
        updatedAt: payments.updatedAt,
        bookingId: bookings.id,
        startDate: bookings.startDate,
        endDate: bookings.endDate,
        guest: {
          firstName: users.firstName,
          lastName: users.lastName,
          email: users.email,
        },
        property: {
          name: listings.name,
          location: listings.location,
        },
      })
      .from(payments)
      .innerJoin(bookings, eq(payments.bookingId, bookings.id))
      .innerJoin(users, eq(bookings.userId, users.id))
      .innerJoin(listings, eq(bookings.listingId, listings.id))
      .where(eq(payments.id, paymentId))
      .limit(1);

    if (!row) return undefined;

    const { bookingId, startDate, endDate, guest, property, ...payment } = row;
    return {
      ...payment,
      booking: { bookingId, startDate, endDate, guest, property },
    };
  }
}
