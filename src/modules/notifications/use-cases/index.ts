export {
  sendNotification,
  renderBody,
  SendNotificationContext,
  DEFAULT_EMAIL_FAILURE,
} from './send-notification.use-case';
export {
  cancelNotification,
  markNotificationDelivered,
  getNotification,
  NotificationStatusContext,
} from './notification-status.use-case';
