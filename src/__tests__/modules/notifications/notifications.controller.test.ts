import { NextFunction } from 'express';
import { Notification, NotificationContent, Recipient } from '../../../domain';
import { NotificationsController } from '../../../modules/notifications/notifications.controller';
import { createTestHarness, TestHarness } from '../../helpers/fakes';
import { createMockRequest, createMockResponse } from '../../helpers/http';

describe('NotificationsController', () => {
  let harness: TestHarness;
  let controller: NotificationsController;
  let next: NextFunction;

  beforeEach(() => {
    harness = createTestHarness();
    controller = new NotificationsController(harness.app.commandBus);
    next = jest.fn();
  });

  it('answers a send with 201', async () => {
    const res = createMockResponse();

    await controller.sendNotification(
      createMockRequest({
        body: { recipient: 'jane@example.com', channel: 'email', subject: 'Hi', body: 'Hello' },
      }),
      res,
      next
    );

    expect(res.status).toHaveBeenCalledWith(201);
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({ data: expect.objectContaining({ status: 'sent' }) })
    );
  });

  it('maps an unknown channel to 400', async () => {
    const res = createMockResponse();

    await controller.sendNotification(
      createMockRequest({
        body: { recipient: 'jane@example.com', channel: 'pigeon', subject: 'Hi', body: 'Hello' },
      }),
      res,
      next
    );

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith(expect.objectContaining({ error_code: 'VALIDATION_ERROR' }));
  });

  it('cancels the notification named in the path', async () => {
    const pending = await harness.notifications.create(
      Notification.create({
        recipient: new Recipient('jane@example.com', 'email'),
        content: new NotificationContent('Reminder', 'Due soon'),
      })
    );
    const res = createMockResponse();

    await controller.cancelNotification(
      createMockRequest({ params: { notificationId: pending.id.value } }),
      res,
      next
    );

    expect(res.status).toHaveBeenCalledWith(200);
    expect(harness.notifications.list()[0].status).toBe('cancelled');
  });

  it('maps marking a pending notification delivered to 422', async () => {
    const pending = await harness.notifications.create(
      Notification.create({
        recipient: new Recipient('jane@example.com', 'email'),
        content: new NotificationContent('Reminder', 'Due soon'),
      })
    );
    const res = createMockResponse();

    await controller.markDelivered(
      createMockRequest({ params: { notificationId: pending.id.value } }),
      res,
      next
    );

    expect(res.status).toHaveBeenCalledWith(422);
  });
});
