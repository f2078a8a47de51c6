import {
  EventPublisher,
  Notification,
  NotificationId,
  NotificationRepository,
} from '../../../domain';
import { EventTypes } from '../../../shared/events';
import { NotificationErrors } from '../../../utils/exceptions';
import type {
  CancelNotificationCommand,
  DeliverNotificationCommand,
  GetNotificationCommand,
} from '../notifications.schemas';

export interface NotificationStatusContext {
  notificationRepo: NotificationRepository;
  eventPublisher: EventPublisher;
}

async function loadNotification(
  notificationRepo: NotificationRepository,
  notificationId: string
): Promise<Notification> {
  const notification = await notificationRepo.getById(new NotificationId(notificationId));
  if (!notification) throw NotificationErrors.notFound(notificationId);
  return notification;
}

function statusEventData(notification: Notification): Record<string, unknown> {
  return {
    notification_id: notification.id.value,
    recipient: notification.recipient.value,
    channel: notification.channel,
    status: notification.status,
  };
}

/**
 * Cancel a pending notification.
 */
export async function cancelNotification(
  ctx: NotificationStatusContext,
  command: CancelNotificationCommand
): Promise<Notification> {
  const notification = await loadNotification(ctx.notificationRepo, command.notification_id);

  notification.cancel();
  const saved = await ctx.notificationRepo.update(notification);

  await ctx.eventPublisher.publish(
    EventTypes.NOTIFICATION_CANCELLED,
    statusEventData(saved),
    command.correlation_id
  );
  return saved;
}

/**
 * Record the provider's delivery receipt for a sent notification.
 */
export async function markNotificationDelivered(
  ctx: NotificationStatusContext,
  command: DeliverNotificationCommand
): Promise<Notification> {
  const notification = await loadNotification(ctx.notificationRepo, command.notification_id);

  notification.markAsDelivered();
  const saved = await ctx.notificationRepo.update(notification);

  await ctx.eventPublisher.publish(
    EventTypes.NOTIFICATION_DELIVERED,
    statusEventData(saved),
    command.correlation_id
  );
  return saved;
}

export async function getNotification(
  ctx: Pick<NotificationStatusContext, 'notificationRepo'>,
  command: GetNotificationCommand
): Promise<Notification> {
  return loadNotification(ctx.notificationRepo, command.notification_id);
}
