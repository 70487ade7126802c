/**
 * Outbound email port and its SMTP implementation.
 *
 * `send` never rejects: every failure is reported as a transient or permanent
 * error so notification handlers can map it onto a task outcome.
 */

import nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import { z } from 'zod';
import type { EmailSettings } from '../config/settings';
import { Logger } from '../logging/logger';

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

export type SendResult =
  | { status: 'sent'; messageId?: string }
  | { status: 'transient-error'; reason: string }
  | { status: 'permanent-error'; reason: string };

export interface EmailSender {
  send(message: EmailMessage): Promise<SendResult>;
}

/**
 * The part of a nodemailer transporter the sender uses.
 */
export interface MailTransport {
  sendMail(mail: Mail.Options): Promise<{ messageId?: string }>;
  close?(): void;
}

const recipientSchema = z.string().email();

const TRANSIENT_CODES = new Set(['ECONNECTION', 'ETIMEDOUT', 'ESOCKET', 'EDNS', 'ECONNRESET', 'ECONNREFUSED', 'EPROXY']);
const PERMANENT_CODES = new Set(['EENVELOPE', 'EMESSAGE', 'EAUTH', 'ENOAUTH']);

interface SmtpFailure {
  code?: string;
  responseCode?: number;
  message: string;
}

function describeFailure(error: unknown): SmtpFailure {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  return {
    code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
    responseCode: 'responseCode' in error && typeof error.responseCode === 'number' ? error.responseCode : undefined,
    message: error.message,
  };
}

/**
 * SMTP reply codes decide first: 4xx is a temporary refusal, 5xx a final one.
 * Without a reply code the nodemailer error code decides; unknown failures are
 * treated as transient.
 */
export function classifySmtpFailure(error: unknown): SendResult {
  const failure = describeFailure(error);
  const reason = failure.responseCode ? `${failure.responseCode} ${failure.message}` : failure.message;

  if (failure.responseCode !== undefined) {
    if (failure.responseCode >= 400 && failure.responseCode < 500) {
      return { status: 'transient-error', reason };
    }
    if (failure.responseCode >= 500) {
      return { status: 'permanent-error', reason };
    }
  }

  if (failure.code && PERMANENT_CODES.has(failure.code)) {
    return { status: 'permanent-error', reason };
  }
  if (failure.code && TRANSIENT_CODES.has(failure.code)) {
    return { status: 'transient-error', reason };
  }
  return { status: 'transient-error', reason };
}

export class SmtpEmailSender implements EmailSender {
  private logger: Logger;

  constructor(
    private readonly transport: MailTransport,
    private readonly from: string,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('smtp-sender');
  }

  async send(message: EmailMessage): Promise<SendResult> {
    if (!recipientSchema.safeParse(message.to).success) {
      return { status: 'permanent-error', reason: `Invalid recipient address: ${message.to}` };
    }

    try {
      const info = await this.transport.sendMail({
        from: this.from,
        to: message.to,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
      this.logger.info(`Email sent: ${message.subject}`, { to: message.to, messageId: info.messageId });
      return { status: 'sent', messageId: info.messageId };
    } catch (error) {
      const result = classifySmtpFailure(error);
      this.logger.logError(`Email delivery failed (${result.status})`, error, { to: message.to });
      return result;
    }
  }

  close(): void {
    this.transport.close?.();
  }
}

export function createSmtpEmailSender(settings: EmailSettings, logger?: Logger): SmtpEmailSender {
  const transport = nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.secure,
    auth: settings.user ? { user: settings.user, pass: settings.password } : undefined,
    connectionTimeout: settings.timeoutMs,
    greetingTimeout: settings.timeoutMs,
    socketTimeout: settings.timeoutMs,
  });
  return new SmtpEmailSender(transport, settings.from, logger);
}
