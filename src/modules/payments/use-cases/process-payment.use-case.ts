import { logger } from '../../../config/logger.config';
import {
  EventPublisher,
  GatewayChargeResult,
  Money,
  Payment,
  PaymentGateway,
  PaymentMethod,
  PaymentRepository,
  TransactionId,
  UserDomainService,
  UserId,
} from '../../../domain';
import { EventTypes } from '../../../shared/events';
import type { ProcessPaymentCommand } from '../payments.schemas';

export const DEFAULT_PAYMENT_FAILURE = 'Payment processing failed';

export interface ProcessPaymentContext {
  paymentRepo: PaymentRepository;
  paymentGateway: PaymentGateway;
  userDomainService: UserDomainService;
  eventPublisher: EventPublisher;
}

/**
 * Charge a payment for an existing user.
 *
 * The payment is persisted as pending, then processing, before the gateway
 * is called. A decline ends in `failed` and a `payment.failed` event; a
 * gateway exception also ends in `failed` and is rethrown.
 *
 * If the process dies during the gateway call the payment stays in
 * `processing`; nothing reconciles it here.
 */
export async function processPayment(
  ctx: ProcessPaymentContext,
  command: ProcessPaymentCommand
): Promise<Payment> {
  const userId = new UserId(command.user_id);
  const money = Money.of(command.amount, command.currency);
  const paymentMethod = new PaymentMethod(command.payment_method);

  await ctx.userDomainService.ensureUserExists(userId);

  const payment = Payment.create({
    userId,
    money,
    paymentMethod,
    reference: command.reference ?? null,
    metadata: command.metadata,
  });
  await ctx.paymentRepo.create(payment);

  payment.markAsProcessing();
  await ctx.paymentRepo.update(payment);

  let charge: GatewayChargeResult;
  try {
    charge = await ctx.paymentGateway.process({
      amount: money.amount,
      currency: money.currency,
      paymentMethod: paymentMethod.type,
      reference: command.reference,
    });
  } catch (error) {
    payment.markAsFailed(`Gateway error: ${error instanceof Error ? error.message : String(error)}`);
    try {
      await ctx.paymentRepo.update(payment);
    } catch (persistError) {
      // The gateway error is what the caller sees
      logger.error('Failed to store failed payment', {
        paymentId: payment.id.value,
        error: persistError instanceof Error ? persistError.message : String(persistError),
      });
    }
    throw error;
  }

  if (charge.success && charge.transactionId) {
    payment.markAsCompleted(new TransactionId(charge.transactionId));
    await ctx.paymentRepo.update(payment);

    await ctx.eventPublisher.publish(
      EventTypes.PAYMENT_COMPLETED,
      {
        payment_id: payment.id.value,
        user_id: userId.value,
        amount: money.formatAmount(),
        currency: money.currency,
        transaction_id: charge.transactionId,
      },
      command.correlation_id
    );
    return payment;
  }

  payment.markAsFailed(charge.error || DEFAULT_PAYMENT_FAILURE);
  await ctx.paymentRepo.update(payment);

  await ctx.eventPublisher.publish(
    EventTypes.PAYMENT_FAILED,
    {
      payment_id: payment.id.value,
      user_id: userId.value,
      reason: payment.failureReason,
    },
    command.correlation_id
  );
  return payment;
}
