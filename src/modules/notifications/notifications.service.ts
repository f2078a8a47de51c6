import { EmailService, EventPublisher, Notification, NotificationRepository } from '../../domain';
import {
  cancelNotification,
  getNotification,
  markNotificationDelivered,
  sendNotification,
} from './use-cases';
import type {
  CancelNotificationCommand,
  DeliverNotificationCommand,
  GetNotificationCommand,
  SendNotificationCommand,
} from './notifications.schemas';

export class NotificationsService {
  constructor(
    private readonly notificationRepo: NotificationRepository,
    private readonly emailService: EmailService,
    private readonly eventPublisher: EventPublisher
  ) {}

  async sendNotification(command: SendNotificationCommand): Promise<Notification> {
    return sendNotification(
      {
        notificationRepo: this.notificationRepo,
        emailService: this.emailService,
        eventPublisher: this.eventPublisher,
      },
      command
    );
  }

  async cancelNotification(command: CancelNotificationCommand): Promise<Notification> {
    return cancelNotification(this.statusContext(), command);
  }

  async markDelivered(command: DeliverNotificationCommand): Promise<Notification> {
    return markNotificationDelivered(this.statusContext(), command);
  }

  async getNotification(command: GetNotificationCommand): Promise<Notification> {
    return getNotification({ notificationRepo: this.notificationRepo }, command);
  }

  private statusContext() {
    return { notificationRepo: this.notificationRepo, eventPublisher: this.eventPublisher };
  }
}
