import { Pool } from 'pg';
import {
  Metadata,
  Notification,
  NotificationChannel,
  NotificationId,
  NotificationRepository,
  NotificationStatus,
} from '../../domain';
import { NotificationErrors } from '../../utils/exceptions';
import { isUniqueViolation, withDbErrorHandling } from '../../utils/db-error-handler';

interface NotificationRow {
  id: string;
  recipient: string;
  channel: NotificationChannel;
  subject: string;
  body: string;
  template_id: string | null;
  user_id: string | null;
  status: NotificationStatus;
  external_id: string | null;
  failure_reason: string | null;
  metadata: Metadata | null;
  sent_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

function notificationFromDatabase(row: NotificationRow): Notification {
  return Notification.fromDict({
    notification_id: row.id,
    recipient: row.recipient,
    channel: row.channel,
    subject: row.subject,
    body: row.body,
    template_id: row.template_id,
    user_id: row.user_id,
    status: row.status,
    external_id: row.external_id,
    failure_reason: row.failure_reason,
    metadata: row.metadata ?? {},
    sent_at: row.sent_at ? row.sent_at.toISOString() : null,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  });
}

export class NotificationsRepository implements NotificationRepository {
  constructor(private readonly db: Pool) {}

  async create(notification: Notification): Promise<Notification> {
    const record = notification.toDict();
    return withDbErrorHandling('create notification', async () => {
      try {
        const result = await this.db.query<NotificationRow>(
          `INSERT INTO notifications (
            id, recipient, channel, subject, body, template_id, user_id, status,
            external_id, failure_reason, metadata, sent_at, created_at, updated_at
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
          RETURNING *`,
          [
            record.notification_id,
            record.recipient,
            record.channel,
            record.subject,
            record.body,
            record.template_id,
            record.user_id,
            record.status,
            record.external_id,
            record.failure_reason,
            JSON.stringify(record.metadata),
            record.sent_at,
            record.created_at,
            record.updated_at,
          ]
        );
        return notificationFromDatabase(result.rows[0]);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw NotificationErrors.alreadyExists(record.notification_id);
        }
        throw error;
      }
    });
  }

  async getById(notificationId: NotificationId): Promise<Notification | null> {
    return withDbErrorHandling('get notification', async () => {
      const result = await this.db.query<NotificationRow>(
        'SELECT * FROM notifications WHERE id = $1',
        [notificationId.value]
      );
      return result.rows.length > 0 ? notificationFromDatabase(result.rows[0]) : null;
    });
  }

  async update(notification: Notification): Promise<Notification> {
    const record = notification.toDict();
    return withDbErrorHandling('update notification', async () => {
      const result = await this.db.query<NotificationRow>(
        `UPDATE notifications
         SET status = $2, external_id = $3, failure_reason = $4, metadata = $5,
             sent_at = $6, updated_at = $7
         WHERE id = $1
         RETURNING *`,
        [
          record.notification_id,
          record.status,
          record.external_id,
          record.failure_reason,
          JSON.stringify(record.metadata),
          record.sent_at,
          record.updated_at,
        ]
      );
      if (result.rows.length === 0) {
        throw NotificationErrors.notFound(record.notification_id);
      }
      return notificationFromDatabase(result.rows[0]);
    });
  }

  async delete(notificationId: NotificationId): Promise<boolean> {
    return withDbErrorHandling('delete notification', async () => {
      const result = await this.db.query('DELETE FROM notifications WHERE id = $1', [
        notificationId.value,
      ]);
      if (!result.rowCount) {
        throw NotificationErrors.notFound(notificationId.value);
      }
      return true;
    });
  }
}
