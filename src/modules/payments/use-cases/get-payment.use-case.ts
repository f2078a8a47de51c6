import { Payment, PaymentId, PaymentRepository } from '../../../domain';
import { PaymentErrors } from '../../../utils/exceptions';
import type { GetPaymentCommand } from '../payments.schemas';

export interface GetPaymentContext {
  paymentRepo: PaymentRepository;
}

export async function getPayment(ctx: GetPaymentContext, command: GetPaymentCommand): Promise<Payment> {
  const payment = await ctx.paymentRepo.getById(new PaymentId(command.payment_id));
  if (!payment) throw PaymentErrors.notFound(command.payment_id);
  return payment;
}
