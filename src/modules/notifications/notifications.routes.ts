import { Router } from 'express';
import { asyncHandler } from '../../shared/async-handler';
import { NotificationsController } from './notifications.controller';

/**
 * Creates notification routes, mounted under /api/v1/notifications
 */
export function createNotificationRoutes(notificationsController: NotificationsController): Router {
  const router = Router();

  router.post('/', asyncHandler(notificationsController.sendNotification));
  router.get('/:notificationId', asyncHandler(notificationsController.getNotification));
  router.post('/:notificationId/cancel', asyncHandler(notificationsController.cancelNotification));
  router.post('/:notificationId/deliver', asyncHandler(notificationsController.markDelivered));

  return router;
}
