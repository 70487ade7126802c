import {
  pgTable,
  pgEnum,
  uuid,
  varchar,
  timestamp,
  date,
  decimal,
  index
} from 'drizzle-orm/pg-core';

// ==========================================
// ENUMS
// ==========================================

export const bookingStatus = pgEnum('booking_status', ['pending', 'confirmed', 'cancelled']);
export const paymentStatus = pgEnum('payment_status', ['pending', 'completed', 'failed']);
export const reconciliationStatus = pgEnum('reconciliation_status', ['confirmed', 'failed']);

// ==========================================
// USERS & LISTINGS
// ==========================================

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  firstName: varchar('first_name', { length: 150 }).notNull().default(''),
  lastName: varchar('last_name', { length: 150 }).notNull().default(''),
  phoneNumber: varchar('phone_number', { length: 32 }),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export const listings = pgTable('listings', {
  id: uuid('id').primaryKey().defaultRandom(),
  hostId: uuid('host_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  name: varchar('name', { length: 255 }).notNull(),
  location: varchar('location', { length: 255 }).notNull(),
  pricePerNight: decimal('price_per_night', { precision: 10, scale: 2 }).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => {
  return {
    hostIdx: index('idx_listings_host').on(table.hostId),
  };
});

// ==========================================
// BOOKINGS & PAYMENTS
// ==========================================

export const bookings = pgTable('bookings', {
  id: uuid('id').primaryKey().defaultRandom(),
  listingId: uuid('listing_id').notNull().references(() => listings.id, { onDelete: 'cascade' }),
  userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  startDate: date('start_date').notNull(),
  endDate: date('end_date').notNull(),
  totalPrice: decimal('total_price', { precision: 10, scale: 2 }).notNull(),
  status: bookingStatus('status').notNull().default('pending'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => {
  return {
    userIdx: index('idx_bookings_user').on(table.userId),
    listingIdx: index('idx_bookings_listing').on(table.listingId),
  };
});

export const payments = pgTable('payments', {
  id: uuid('id').primaryKey().defaultRandom(),
  bookingId: uuid('booking_id').notNull().references(() => bookings.id, { onDelete: 'cascade' }),
  amount: decimal('amount', { precision: 10, scale: 2 }).notNull(),
  currency: varchar('currency', { length: 3 }).notNull().default('ETB'),
  status: paymentStatus('status').notNull().default('pending'),
  transactionRef: varchar('transaction_ref', { length: 100 }).notNull().unique(),
  transactionId: varchar('transaction_id', { length: 100 }),
  paymentDate: timestamp('payment_date'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => {
  return {
    bookingIdx: index('idx_payments_booking').on(table.bookingId),
  };
});

// ==========================================
// PAYMENT RECONCILIATION
// ==========================================

/**
 * One row per transaction reference that reached a terminal state. Written
 * once; `notifiedAt` is claimed by whoever enqueues the notification.
 */
export const paymentReconciliations = pgTable('payment_reconciliations', {
  transactionRef: varchar('transaction_ref', { length: 100 }).primaryKey(),
  paymentId: uuid('payment_id').notNull().references(() => payments.id, { onDelete: 'cascade' }),
  bookingId: uuid('booking_id').notNull().references(() => bookings.id, { onDelete: 'cascade' }),
  status: reconciliationStatus('status').notNull(),
  providerReference: varchar('provider_reference', { length: 100 }),
  verifiedAt: timestamp('verified_at').notNull(),
  notifiedAt: timestamp('notified_at'),
});

// ==========================================
// TYPE EXPORTS
// ==========================================

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type Listing = typeof listings.$inferSelect;
export type NewListing = typeof listings.$inferInsert;
export type Booking = typeof bookings.$inferSelect;
export type NewBooking = typeof bookings.$inferInsert;
export type Payment = typeof payments.$inferSelect;
export type NewPayment = typeof payments.$inferInsert;
export type PaymentReconciliation = typeof paymentReconciliations.$inferSelect;
export type NewPaymentReconciliation = typeof paymentReconciliations.$inferInsert;

export type BookingStatus = Booking['status'];
export type PaymentStatus = Payment['status'];
