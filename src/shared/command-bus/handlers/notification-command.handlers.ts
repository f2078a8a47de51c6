/**
 * Notification Command Handlers
 *
 * Route notification sub-operations (send, cancel, deliver, get) to
 * NotificationsService. There is no stream handler: notifications arrive
 * over HTTP or the task queue only.
 */

import { Operations, Transports } from '../../../domain/commands';
import type { NotificationsService } from '../../../modules/notifications/notifications.service';
import {
  notificationIdCommandSchema,
  sendNotificationCommandSchema,
} from '../../../modules/notifications/notifications.schemas';
import { BaseCommandHandler, OperationRoute, parseCommand } from '../base-command.handler';
import type { HandlerRegistration } from '../handler-registry';

abstract class NotificationCommandHandler extends BaseCommandHandler {
  protected readonly defaultOperation = 'send';

  constructor(private readonly notificationsService: NotificationsService) {
    super();
  }

  protected routes(): Record<string, OperationRoute> {
    return {
      send: async (data, context) => {
        const command = parseCommand(sendNotificationCommandSchema, this.withCorrelation(data, context));
        const notification = await this.notificationsService.sendNotification(command);
        return notification.toDict();
      },
      cancel: async (data, context) => {
        const notification = await this.notificationsService.cancelNotification(
          this.parseIdCommand(data, context.notificationId, context.correlationId)
        );
        return notification.toDict();
      },
      deliver: async (data, context) => {
        const notification = await this.notificationsService.markDelivered(
          this.parseIdCommand(data, context.notificationId, context.correlationId)
        );
        return notification.toDict();
      },
      get: async (data, context) => {
        const notification = await this.notificationsService.getNotification(
          this.parseIdCommand(data, context.notificationId, context.correlationId)
        );
        return notification.toDict();
      },
    };
  }

  private parseIdCommand(
    data: Record<string, unknown>,
    pathId: string | undefined,
    correlationId: string
  ) {
    const input = this.withEntityId(data, 'notification_id', pathId);
    return parseCommand(notificationIdCommandSchema, { ...input, correlation_id: correlationId });
  }
}

export class NotificationHttpCommandHandler extends NotificationCommandHandler {
  protected readonly transport = Transports.HTTP;
}

export class NotificationQueueCommandHandler extends NotificationCommandHandler {
  protected readonly transport = Transports.QUEUE;
}

export function getNotificationCommandHandlers(
  notificationsService: NotificationsService
): HandlerRegistration[] {
  return [
    {
      operation: Operations.NOTIFICATIONS,
      transport: Transports.HTTP,
      factory: () => new NotificationHttpCommandHandler(notificationsService),
    },
    {
      operation: Operations.NOTIFICATIONS,
      transport: Transports.QUEUE,
      factory: () => new NotificationQueueCommandHandler(notificationsService),
    },
  ];
}
