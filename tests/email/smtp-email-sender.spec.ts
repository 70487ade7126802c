import { describe, expect, it, vi } from 'vitest';
import { SmtpEmailSender, classifySmtpFailure, type MailTransport } from '../../shared/email/EmailSender';
import { testLogger } from '../helpers/fakes';

class SmtpError extends Error {
  constructor(message: string, readonly code?: string, readonly responseCode?: number) {
    super(message);
  }
}

const message = { to: 'guest@example.com', subject: 'Hello', text: 'Hi there', html: '<p>Hi there</p>' };

function senderWith(sendMail: MailTransport['sendMail']) {
  const transport: MailTransport = { sendMail, close: vi.fn() };
  return { transport, sender: new SmtpEmailSender(transport, 'bookings@example.com', testLogger) };
}

describe('classifySmtpFailure', () => {
  it('treats 4xx replies as transient', () => {
    expect(classifySmtpFailure(new SmtpError('Try again later', 'EENVELOPE', 451))).toEqual({
      status: 'transient-error',
      reason: '451 Try again later',
    });
  });

  it('treats 5xx replies as permanent', () => {
    expect(classifySmtpFailure(new SmtpError('Mailbox unavailable', undefined, 550))).toEqual({
      status: 'permanent-error',
      reason: '550 Mailbox unavailable',
    });
  });

  it('falls back to the error code without a reply', () => {
    expect(classifySmtpFailure(new SmtpError('Invalid login', 'EAUTH'))).toEqual({
      status: 'permanent-error',
      reason: 'Invalid login',
    });
    expect(classifySmtpFailure(new SmtpError('Connection timeout', 'ETIMEDOUT'))).toEqual({
      status: 'transient-error',
      reason: 'Connection timeout',
    });
  });

  it('treats unknown failures as transient', () => {
    expect(classifySmtpFailure('socket hang up')).toEqual({ status: 'transient-error', reason: 'socket hang up' });
  });
});

describe('SmtpEmailSender', () => {
  it('sends from the configured address', async () => {
    const sendMail = vi.fn(async () => ({ messageId: '<abc@example.com>' }));
    const { sender } = senderWith(sendMail);

    await expect(sender.send(message)).resolves.toEqual({ status: 'sent', messageId: '<abc@example.com>' });
    expect(sendMail).toHaveBeenCalledWith({
      from: 'bookings@example.com',
      to: 'guest@example.com',
      subject: 'Hello',
      text: 'Hi there',
      html: '<p>Hi there</p>',
    });
  });

  it('rejects malformed recipients without contacting the server', async () => {
    const sendMail = vi.fn(async () => ({ messageId: 'unused' }));
    const { sender } = senderWith(sendMail);

    await expect(sender.send({ ...message, to: 'not-an-address' })).resolves.toEqual({
      status: 'permanent-error',
      reason: 'Invalid recipient address: not-an-address',
    });
    expect(sendMail).not.toHaveBeenCalled();
  });

  it('reports server refusals instead of throwing', async () => {
    const { sender } = senderWith(async () => {
      throw new SmtpError('Greylisted', 'EENVELOPE', 450);
    });

    await expect(sender.send(message)).resolves.toEqual({ status: 'transient-error', reason: '450 Greylisted' });
  });

  it('closes the underlying transport', () => {
    const { transport, sender } = senderWith(async () => ({}));
    sender.close();
    expect(transport.close).toHaveBeenCalledTimes(1);
  });
});
