import { Notification, NotificationId, NotificationRecord, NotificationRepository } from '../../domain';
import { NotificationErrors } from '../../utils/exceptions';

export class InMemoryNotificationRepository implements NotificationRepository {
  private notifications = new Map<string, NotificationRecord>();

  async create(notification: Notification): Promise<Notification> {
    const record = notification.toDict();
    if (this.notifications.has(record.notification_id)) {
      throw NotificationErrors.alreadyExists(record.notification_id);
    }
    this.notifications.set(record.notification_id, record);
    return Notification.fromDict(record);
  }

  async getById(notificationId: NotificationId): Promise<Notification | null> {
    const record = this.notifications.get(notificationId.value);
    return record ? Notification.fromDict(record) : null;
  }

  async update(notification: Notification): Promise<Notification> {
    const record = notification.toDict();
    if (!this.notifications.has(record.notification_id)) {
      throw NotificationErrors.notFound(record.notification_id);
    }
    this.notifications.set(record.notification_id, record);
    return Notification.fromDict(record);
  }

  async delete(notificationId: NotificationId): Promise<boolean> {
    if (!this.notifications.delete(notificationId.value)) {
      throw NotificationErrors.notFound(notificationId.value);
    }
    return true;
  }

  /** Stored notifications, oldest first. */
  list(): Notification[] {
    return Array.from(this.notifications.values()).map((record) => Notification.fromDict(record));
  }
}
