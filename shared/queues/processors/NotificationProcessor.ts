import { TaskOutcome, type TaskContext, type TaskHandler, type TaskPayload } from '../types/interfaces';
import type { EmailMessage, EmailSender } from '../../email/EmailSender';
import type { NotificationRepository } from '../../db/NotificationRepository';

/**
 * Shared shape of the notification handlers: load current state, build the
 * message, send it, and map the send result onto a task outcome.
 *
 * Handlers hold no state between runs, so running one twice for the same
 * entity only sends the email again.
 */
export abstract class NotificationProcessor<TPayload extends TaskPayload> {
  constructor(
    protected readonly repository: NotificationRepository,
    protected readonly sender: EmailSender
  ) {}

  abstract process(payload: TPayload, context: TaskContext): Promise<TaskOutcome>;

  handler(): TaskHandler<TPayload> {
    return (payload, context) => this.process(payload, context);
  }

  protected async deliver(message: EmailMessage, context: TaskContext): Promise<TaskOutcome> {
    const result = await this.sender.send(message);

    switch (result.status) {
      case 'sent':
        context.logger.info(`Email "${message.subject}" sent to ${message.to}`);
        return TaskOutcome.success();
      case 'transient-error':
        return TaskOutcome.retryable(result.reason);
      case 'permanent-error':
        return TaskOutcome.fatal(result.reason);
    }
  }
}
