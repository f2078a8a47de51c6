import { NotificationId } from '../common/identifiers';
import { Notification } from './notification.entity';

export interface NotificationRepository {
  create(notification: Notification): Promise<Notification>;
  getById(notificationId: NotificationId): Promise<Notification | null>;
  update(notification: Notification): Promise<Notification>;
  delete(notificationId: NotificationId): Promise<boolean>;
}

export interface EmailMessage {
  recipient: string;
  subject: string;
  body: string;
  templateId?: string | null;
  variables?: Record<string, string>;
}

export interface EmailSendResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export interface EmailService {
  send(message: EmailMessage): Promise<EmailSendResult>;
}
