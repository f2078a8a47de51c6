import { logger } from '../../../config/logger.config';
import {
  EmailService,
  EventPublisher,
  Notification,
  NotificationContent,
  NotificationRepository,
  Recipient,
  UserId,
} from '../../../domain';
import { EventTypes } from '../../../shared/events';
import type { SendNotificationCommand } from '../notifications.schemas';

export const DEFAULT_EMAIL_FAILURE = 'Failed to send email';

export interface SendNotificationContext {
  notificationRepo: NotificationRepository;
  emailService: EmailService;
  eventPublisher: EventPublisher;
}

/**
 * Replace each `{key}` with its value. Placeholders without a variable are
 * left as written.
 */
export function renderBody(body: string, variables: Record<string, string>): string {
  return Object.entries(variables).reduce(
    (rendered, [key, value]) => rendered.split(`{${key}}`).join(value),
    body
  );
}

function stringifyVariables(
  variables: SendNotificationCommand['variables']
): Record<string, string> {
  return Object.fromEntries(Object.entries(variables).map(([key, value]) => [key, String(value)]));
}

/**
 * Create a notification and deliver it over its channel.
 *
 * Only email has a provider; every other channel fails without an external
 * call. Either way the outcome is stored and published as
 * `notification.sent` or `notification.failed`.
 */
export async function sendNotification(
  ctx: SendNotificationContext,
  command: SendNotificationCommand
): Promise<Notification> {
  const variables = stringifyVariables(command.variables);
  const body = renderBody(command.body, variables);

  const notification = Notification.create({
    recipient: new Recipient(command.recipient, command.channel),
    content: new NotificationContent(command.subject, body, command.template_id ?? null),
    userId: command.user_id ? new UserId(command.user_id) : null,
  });
  await ctx.notificationRepo.create(notification);

  try {
    if (notification.channel === 'email') {
      const result = await ctx.emailService.send({
        recipient: command.recipient,
        subject: command.subject,
        body,
        templateId: command.template_id ?? null,
        variables,
      });
      if (result.success) {
        notification.markAsSent(result.messageId ?? null);
      } else {
        notification.markAsFailed(result.error || DEFAULT_EMAIL_FAILURE);
      }
    } else {
      notification.markAsFailed(`Channel ${notification.channel} not implemented`);
    }

    await ctx.notificationRepo.update(notification);

    await ctx.eventPublisher.publish(
      notification.status === 'sent' ? EventTypes.NOTIFICATION_SENT : EventTypes.NOTIFICATION_FAILED,
      {
        notification_id: notification.id.value,
        recipient: notification.recipient.value,
        channel: notification.channel,
        status: notification.status,
      },
      command.correlation_id
    );
  } catch (error) {
    if (notification.status === 'pending') {
      notification.markAsFailed(
        `Service error: ${error instanceof Error ? error.message : String(error)}`
      );
      try {
        await ctx.notificationRepo.update(notification);
      } catch (persistError) {
        // The send error is what the caller sees
        logger.error('Failed to store failed notification', {
          notificationId: notification.id.value,
          error: persistError instanceof Error ? persistError.message : String(persistError),
        });
      }
    }
    throw error;
  }

  return notification;
}
