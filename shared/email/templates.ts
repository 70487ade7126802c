/**
 * Notification email content. Each builder returns the subject with an HTML
 * body and an equivalent plain-text body.
 */

import type { EmailMessage } from './EmailSender';

export const TEAM_SIGNATURE = 'The Travel Team';

export interface Party {
  firstName: string;
  lastName: string;
  email: string;
}

export interface Property {
  name: string;
  location: string;
}

export interface BookingConfirmationContent {
  bookingId: string;
  guest: Party;
  property: Property;
  host: Party & { phone: string | null };
  checkIn: string;
  checkOut: string;
  totalPrice: string;
}

export interface PaymentConfirmationContent {
  bookingId: string;
  guest: Party;
  property: Property;
  checkIn: string;
  checkOut: string;
  nights: number;
  amount: string;
  currency: string;
  transactionId: string;
  paidAt: Date;
}

export interface PaymentFailedContent {
  bookingId: string;
  guest: Party;
  amount: string;
  currency: string;
}

type Detail = [label: string, value: string];

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * `YYYY-MM-DD HH:mm` in UTC.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

function fullName(party: Party): string {
  return `${party.firstName} ${party.lastName}`.trim();
}

function htmlList(details: Detail[]): string {
  const items = details
    .map(([label, value]) => `  <li><strong>${escapeHtml(label)}:</strong> ${escapeHtml(value)}</li>`)
    .join('\n');
  return `<ul>\n${items}\n</ul>`;
}

function textList(details: Detail[]): string {
  return details.map(([label, value]) => `- ${label}: ${value}`).join('\n');
}

interface Section {
  title?: string;
  details: Detail[];
}

function render(
  to: string,
  subject: string,
  heading: string,
  recipient: Party,
  intro: string,
  sections: Section[],
  closing: string
): EmailMessage {
  const greeting = `Dear ${fullName(recipient)},`;

  const html = [
    '<html>',
    '<body>',
    `<h2>${escapeHtml(heading)}</h2>`,
    `<p>${escapeHtml(greeting)}</p>`,
    `<p>${escapeHtml(intro)}</p>`,
    ...sections.flatMap(section => [
      ...(section.title ? [`<h3>${escapeHtml(section.title)}:</h3>`] : []),
      htmlList(section.details),
    ]),
    `<p>${escapeHtml(closing)}</p>`,
    `<p>Best regards,<br>${escapeHtml(TEAM_SIGNATURE)}</p>`,
    '</body>',
    '</html>',
  ].join('\n');

  const text = [
    heading,
    '',
    greeting,
    intro,
    ...sections.flatMap(section => ['', ...(section.title ? [`${section.title}:`] : []), textList(section.details)]),
    '',
    closing,
    '',
    'Best regards,',
    TEAM_SIGNATURE,
  ].join('\n');

  return { to, subject, text, html };
}

export function bookingConfirmationEmail(content: BookingConfirmationContent): EmailMessage {
  return render(
    content.guest.email,
    `Booking Confirmed - ${content.property.name}`,
    'Booking Confirmed!',
    content.guest,
    'Your booking has been confirmed by the host.',
    [
      {
        title: 'Booking Details',
        details: [
          ['Property', content.property.name],
          ['Location', content.property.location],
          ['Check-in', content.checkIn],
          ['Check-out', content.checkOut],
          ['Total Price', `ETB ${content.totalPrice}`],
        ],
      },
      {
        title: 'Host Information',
        details: [
          ['Name', fullName(content.host)],
          ['Email', content.host.email],
          ['Phone', content.host.phone || 'N/A'],
        ],
      },
    ],
    'We hope you have a wonderful stay!'
  );
}

export function paymentConfirmationEmail(content: PaymentConfirmationContent): EmailMessage {
  return render(
    content.guest.email,
    `Payment Confirmation - Booking #${content.bookingId}`,
    'Payment Confirmed!',
    content.guest,
    'Your payment has been successfully processed.',
    [
      {
        title: 'Booking Details',
        details: [
          ['Property', content.property.name],
          ['Location', content.property.location],
          ['Check-in', content.checkIn],
          ['Check-out', content.checkOut],
          ['Duration', `${content.nights} nights`],
        ],
      },
      {
        title: 'Payment Details',
        details: [
          ['Amount Paid', `${content.currency} ${content.amount}`],
          ['Transaction ID', content.transactionId],
          ['Payment Date', formatTimestamp(content.paidAt)],
        ],
      },
    ],
    'Thank you for choosing our service!'
  );
}

export function paymentFailedEmail(content: PaymentFailedContent): EmailMessage {
  return render(
    content.guest.email,
    'Payment Failed - Action Required',
    'Payment Failed',
    content.guest,
    'Unfortunately, your payment could not be processed.',
    [
      {
        details: [
          ['Booking Reference', content.bookingId],
          ['Amount', `${content.currency} ${content.amount}`],
        ],
      },
    ],
    'Please try again or contact our support team for assistance.'
  );
}
