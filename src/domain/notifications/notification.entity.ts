import { BusinessRuleViolationException, ValidationException } from '../../utils/exceptions';
import { NotificationId, UserId } from '../common/identifiers';
import { Metadata } from '../common/event-publisher.port';
import { nextTimestamp, parseTimestamp } from '../common/timestamps';
import { NotificationChannel, NotificationContent, Recipient, parseChannel } from './value-objects';

export const NOTIFICATION_STATUSES = ['pending', 'sent', 'delivered', 'failed', 'cancelled'] as const;

export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number];

export function parseNotificationStatus(value: string): NotificationStatus {
  const status = NOTIFICATION_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new ValidationException(`Invalid notification status: ${value}`, 'status');
  }
  return status;
}

export interface NotificationRecord {
  notification_id: string;
  recipient: string;
  channel: NotificationChannel;
  subject: string;
  body: string;
  template_id: string | null;
  user_id: string | null;
  status: NotificationStatus;
  external_id: string | null;
  failure_reason: string | null;
  metadata: Metadata;
  sent_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface NotificationProps {
  id: NotificationId;
  recipient: Recipient;
  content: NotificationContent;
  userId?: UserId | null;
  status?: NotificationStatus;
  externalId?: string | null;
  failureReason?: string | null;
  metadata?: Metadata;
  sentAt?: Date | null;
  createdAt?: Date;
  updatedAt?: Date;
}

const TRANSITION_RULE = 'Notification status transition';

/**
 * Notification aggregate.
 *
 * pending -> sent | failed | cancelled
 * sent -> delivered
 */
export class Notification {
  readonly id: NotificationId;
  readonly recipient: Recipient;
  readonly content: NotificationContent;
  readonly userId: UserId | null;
  readonly createdAt: Date;
  private _status: NotificationStatus;
  private _externalId: string | null;
  private _failureReason: string | null;
  private _metadata: Metadata;
  private _sentAt: Date | null;
  private _updatedAt: Date;

  constructor(props: NotificationProps) {
    this.id = props.id;
    this.recipient = props.recipient;
    this.content = props.content;
    this.userId = props.userId ?? null;
    this._status = props.status ?? 'pending';
    this._externalId = props.externalId ?? null;
    this._failureReason = props.failureReason ?? null;
    this._metadata = { ...(props.metadata ?? {}) };
    this._sentAt = props.sentAt ?? null;
    this.createdAt = props.createdAt ?? new Date();
    this._updatedAt = props.updatedAt ?? this.createdAt;
  }

  static create(
    props: Omit<NotificationProps, 'id' | 'status' | 'externalId' | 'failureReason' | 'sentAt' | 'createdAt' | 'updatedAt'>
  ): Notification {
    return new Notification({ ...props, id: NotificationId.generate(), status: 'pending' });
  }

  get channel(): NotificationChannel {
    return this.recipient.channel;
  }

  get status(): NotificationStatus {
    return this._status;
  }

  get externalId(): string | null {
    return this._externalId;
  }

  get failureReason(): string | null {
    return this._failureReason;
  }

  get metadata(): Metadata {
    return { ...this._metadata };
  }

  get sentAt(): Date | null {
    return this._sentAt;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  markAsSent(externalId?: string | null): void {
    if (this._status !== 'pending') {
      throw new BusinessRuleViolationException(TRANSITION_RULE, `Cannot mark as sent from ${this._status}`);
    }
    const now = nextTimestamp(this._updatedAt);
    this._status = 'sent';
    this._externalId = externalId ?? null;
    this._failureReason = null;
    this._sentAt = now;
    this._updatedAt = now;
  }

  markAsFailed(reason: string): void {
    if (this._status !== 'pending') {
      throw new BusinessRuleViolationException(TRANSITION_RULE, `Cannot mark as failed from ${this._status}`);
    }
    this._status = 'failed';
    this._failureReason = reason;
    this.touch();
  }

  markAsDelivered(): void {
    if (this._status !== 'sent') {
      throw new BusinessRuleViolationException(
        TRANSITION_RULE,
        'Can only mark sent notifications as delivered'
      );
    }
    this._status = 'delivered';
    this.touch();
  }

  cancel(): void {
    if (this._status === 'sent' || this._status === 'delivered') {
      throw new BusinessRuleViolationException(
        'Notification cancellation',
        'Cannot cancel already sent notifications'
      );
    }
    if (this._status !== 'pending') {
      throw new BusinessRuleViolationException(
        'Notification cancellation',
        `Cannot cancel notification with status ${this._status}`
      );
    }
    this._status = 'cancelled';
    this.touch();
  }

  toDict(): NotificationRecord {
    return {
      notification_id: this.id.value,
      recipient: this.recipient.value,
      channel: this.recipient.channel,
      subject: this.content.subject,
      body: this.content.body,
      template_id: this.content.templateId,
      user_id: this.userId ? this.userId.value : null,
      status: this._status,
      external_id: this._externalId,
      failure_reason: this._failureReason,
      metadata: { ...this._metadata },
      sent_at: this._sentAt ? this._sentAt.toISOString() : null,
      created_at: this.createdAt.toISOString(),
      updated_at: this._updatedAt.toISOString(),
    };
  }

  static fromDict(record: NotificationRecord): Notification {
    return new Notification({
      id: new NotificationId(record.notification_id),
      recipient: new Recipient(record.recipient, parseChannel(record.channel)),
      content: new NotificationContent(record.subject, record.body, record.template_id),
      userId: record.user_id ? new UserId(record.user_id) : null,
      status: parseNotificationStatus(record.status),
      externalId: record.external_id,
      failureReason: record.failure_reason,
      metadata: record.metadata,
      sentAt: record.sent_at ? parseTimestamp(record.sent_at, 'sent_at') : null,
      createdAt: parseTimestamp(record.created_at, 'created_at'),
      updatedAt: parseTimestamp(record.updated_at, 'updated_at'),
    });
  }

  private touch(): void {
    this._updatedAt = nextTimestamp(this._updatedAt);
  }
}
