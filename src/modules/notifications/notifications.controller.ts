import { Request, Response, NextFunction } from 'express';
import { Operations } from '../../domain/commands';
import type { CommandBus } from '../../shared/command-bus/command-bus';
import { buildHttpEnvelope, renderResult, requireBody, requireParam } from '../../utils/controller-helpers';

type NotificationAction = 'get' | 'cancel' | 'deliver';

export class NotificationsController {
  constructor(private readonly commandBus: CommandBus) {}

  /**
   * POST /api/v1/notifications
   */
  sendNotification = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const envelope = buildHttpEnvelope(req, Operations.NOTIFICATIONS, 'send', requireBody(req));
      renderResult(res, await this.commandBus.dispatch(envelope), 201);
    } catch (error) {
      next(error);
    }
  };

  /** GET /api/v1/notifications/:notificationId */
  getNotification = (req: Request, res: Response, next: NextFunction) =>
    this.dispatchById('get', req, res, next);

  /** POST /api/v1/notifications/:notificationId/cancel */
  cancelNotification = (req: Request, res: Response, next: NextFunction) =>
    this.dispatchById('cancel', req, res, next);

  /** POST /api/v1/notifications/:notificationId/deliver */
  markDelivered = (req: Request, res: Response, next: NextFunction) =>
    this.dispatchById('deliver', req, res, next);

  private async dispatchById(
    action: NotificationAction,
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const envelope = buildHttpEnvelope(req, Operations.NOTIFICATIONS, action, {}, {
        notificationId: requireParam(req, 'notificationId'),
      });
      renderResult(res, await this.commandBus.dispatch(envelope));
    } catch (error) {
      next(error);
    }
  }
}
