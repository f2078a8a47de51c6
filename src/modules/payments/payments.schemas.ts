import { z } from 'zod';

/**
 * Zod schemas for payment commands
 */

const correlationId = z.string().min(1).optional();

const paymentIdField = z.string().min(1, 'Payment ID cannot be empty');

/** Schema for charging a payment through the gateway */
export const processPaymentCommandSchema = z
  .object({
    user_id: z.string().min(1, 'User ID cannot be empty'),
    // Decimal strings ("99.99") keep their exact value on the wire
    amount: z.union([z.number(), z.string()]),
    currency: z.string().regex(/^[A-Z]{3}$/, 'Currency must be 3-letter ISO code'),
    payment_method: z.string().min(1, 'Payment method cannot be empty'),
    reference: z.string().optional(),
    metadata: z.record(z.unknown()).default({}),
    correlation_id: correlationId,
  })
  .strict();

/** Schema for refunding a completed payment */
export const refundPaymentCommandSchema = z
  .object({
    payment_id: paymentIdField,
    reason: z.string().min(1, 'Refund reason cannot be empty'),
    correlation_id: correlationId,
  })
  .strict();

export const getPaymentCommandSchema = z
  .object({
    payment_id: paymentIdField,
    correlation_id: correlationId,
  })
  .strict();

export type ProcessPaymentCommand = z.infer<typeof processPaymentCommandSchema>;
export type RefundPaymentCommand = z.infer<typeof refundPaymentCommandSchema>;
export type GetPaymentCommand = z.infer<typeof getPaymentCommandSchema>;
