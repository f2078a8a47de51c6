import {
  Notification,
  NotificationContent,
  NotificationId,
  NotificationStatus,
  Recipient,
  UserId,
} from '../../domain';
import { BusinessRuleViolationException } from '../../utils/exceptions';

function buildNotification(status: NotificationStatus = 'pending'): Notification {
  return new Notification({
    id: new NotificationId('note-1'),
    recipient: new Recipient('jane@example.com', 'email'),
    content: new NotificationContent('Hello', 'Body text'),
    userId: new UserId('user-1'),
    status,
  });
}

describe('Notification transitions', () => {
  it('marks a pending notification as sent with its external id', () => {
    const notification = buildNotification();

    notification.markAsSent('msg-9');

    expect(notification.status).toBe('sent');
    expect(notification.externalId).toBe('msg-9');
    expect(notification.sentAt).toEqual(notification.updatedAt);
  });

  it('delivers only sent notifications', () => {
    const sent = buildNotification('sent');
    sent.markAsDelivered();
    expect(sent.status).toBe('delivered');

    expect(() => buildNotification('pending').markAsDelivered()).toThrow(
      'Business rule violation: Notification status transition - Can only mark sent notifications as delivered'
    );
  });

  it('cancels a pending notification', () => {
    const notification = buildNotification();

    notification.cancel();

    expect(notification.status).toBe('cancelled');
  });

  it.each(['sent', 'delivered'] as const)('refuses to cancel a %s notification', (status) => {
    const notification = buildNotification(status);

    expect(() => notification.cancel()).toThrow(
      'Business rule violation: Notification cancellation - Cannot cancel already sent notifications'
    );
    expect(notification.status).toBe(status);
  });

  it.each(['failed', 'cancelled'] as const)('refuses to cancel a %s notification', (status) => {
    expect(() => buildNotification(status).cancel()).toThrow(BusinessRuleViolationException);
  });

  it('cannot be sent twice', () => {
    const notification = buildNotification('sent');

    expect(() => notification.markAsSent('msg-2')).toThrow(BusinessRuleViolationException);
    expect(notification.externalId).toBeNull();
  });

  it('round-trips through toDict and fromDict', () => {
    const notification = buildNotification();
    notification.markAsSent('msg-1');

    expect(Notification.fromDict(notification.toDict()).toDict()).toEqual(notification.toDict());
  });
});

describe('Recipient', () => {
  it('requires an @ for email', () => {
    expect(() => new Recipient('jane.example.com', 'email')).toThrow('Invalid email recipient');
  });

  it('accepts phone numbers with separators for sms', () => {
    expect(new Recipient('+1 555-0100', 'sms').value).toBe('+1 555-0100');
  });

  it('rejects letters in an sms recipient', () => {
    expect(() => new Recipient('555-CALL', 'sms')).toThrow('Invalid phone number recipient');
  });

  it('takes any non-empty value for push', () => {
    expect(new Recipient('device-token', 'push').channel).toBe('push');
  });
});

describe('NotificationContent', () => {
  it('rejects a subject over 500 characters', () => {
    expect(() => new NotificationContent('s'.repeat(501), 'body')).toThrow(
      'Subject cannot exceed 500 characters'
    );
  });

  it('rejects an empty body', () => {
    expect(() => new NotificationContent('subject', ' ')).toThrow('Body cannot be empty');
  });
});
