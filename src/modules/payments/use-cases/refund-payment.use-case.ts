import { EventPublisher, Payment, PaymentId, PaymentRepository } from '../../../domain';
import { EventTypes } from '../../../shared/events';
import { PaymentErrors } from '../../../utils/exceptions';
import type { RefundPaymentCommand } from '../payments.schemas';

export interface RefundPaymentContext {
  paymentRepo: PaymentRepository;
  eventPublisher: EventPublisher;
}

/**
 * Refund a completed payment. Only the status changes locally; the refund
 * reason is kept in metadata.
 */
export async function refundPayment(
  ctx: RefundPaymentContext,
  command: RefundPaymentCommand
): Promise<Payment> {
  const paymentId = new PaymentId(command.payment_id);
  const payment = await ctx.paymentRepo.getById(paymentId);
  if (!payment) throw PaymentErrors.notFound(paymentId.value);

  payment.refund(command.reason);
  const saved = await ctx.paymentRepo.update(payment);

  await ctx.eventPublisher.publish(
    EventTypes.PAYMENT_REFUNDED,
    {
      payment_id: saved.id.value,
      user_id: saved.userId.value,
      reason: command.reason,
    },
    command.correlation_id
  );

  return saved;
}
