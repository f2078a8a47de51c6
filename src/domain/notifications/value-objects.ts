import { ValidationException } from '../../utils/exceptions';

export const NOTIFICATION_CHANNELS = ['email', 'sms', 'push', 'webhook'] as const;

export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number];

export function parseChannel(value: string): NotificationChannel {
  const channel = NOTIFICATION_CHANNELS.find((candidate) => candidate === value);
  if (!channel) {
    throw new ValidationException(`Invalid notification channel: ${value}`, 'channel');
  }
  return channel;
}

const PHONE_SEPARATORS = /[+\- ]/g;
const DIGITS_ONLY = /^\d+$/;

/**
 * Destination address, validated against its channel.
 */
export class Recipient {
  constructor(
    readonly value: string,
    readonly channel: NotificationChannel
  ) {
    if (!value || !value.trim()) {
      throw new ValidationException('Recipient cannot be empty', 'recipient');
    }
    if (channel === 'email' && !value.includes('@')) {
      throw new ValidationException('Invalid email recipient', 'recipient');
    }
    if (channel === 'sms' && !DIGITS_ONLY.test(value.replace(PHONE_SEPARATORS, ''))) {
      throw new ValidationException('Invalid phone number recipient', 'recipient');
    }
  }

  toString(): string {
    return this.value;
  }
}

export const MAX_SUBJECT_LENGTH = 500;

export class NotificationContent {
  constructor(
    readonly subject: string,
    readonly body: string,
    readonly templateId: string | null = null
  ) {
    if (!subject.trim()) {
      throw new ValidationException('Subject cannot be empty', 'subject');
    }
    if (!body.trim()) {
      throw new ValidationException('Body cannot be empty', 'body');
    }
    if (subject.length > MAX_SUBJECT_LENGTH) {
      throw new ValidationException(
        `Subject cannot exceed ${MAX_SUBJECT_LENGTH} characters`,
        'subject'
      );
    }
  }
}
