import { z } from 'zod';
import { NOTIFICATION_CHANNELS } from '../../domain';

/**
 * Zod schemas for notification commands
 */

const correlationId = z.string().min(1).optional();

const notificationIdField = z.string().min(1, 'Notification ID cannot be empty');

/** Schema for creating and sending a notification */
export const sendNotificationCommandSchema = z
  .object({
    recipient: z.string().min(1, 'Recipient cannot be empty'),
    channel: z.enum(NOTIFICATION_CHANNELS),
    subject: z
      .string()
      .min(1, 'Subject cannot be empty')
      .max(500, 'Subject cannot exceed 500 characters'),
    body: z.string().min(1, 'Body cannot be empty'),
    user_id: z.string().min(1).optional(),
    template_id: z.string().min(1).optional(),
    // Values replace `{key}` placeholders in the body
    variables: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
    correlation_id: correlationId,
  })
  .strict();

/** Schema for cancel, deliver and get */
export const notificationIdCommandSchema = z
  .object({
    notification_id: notificationIdField,
    correlation_id: correlationId,
  })
  .strict();

export type SendNotificationCommand = z.infer<typeof sendNotificationCommandSchema>;
export type CancelNotificationCommand = z.infer<typeof notificationIdCommandSchema>;
export type DeliverNotificationCommand = z.infer<typeof notificationIdCommandSchema>;
export type GetNotificationCommand = z.infer<typeof notificationIdCommandSchema>;
