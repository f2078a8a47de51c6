import { createEnvelope, HandlerContext, Transports } from '../../../domain';
import { ErrorCode } from '../../../utils/exceptions';
import { createTestHarness, TestHarness } from '../../helpers/fakes';

function dispatchPayments(
  harness: TestHarness,
  payload: Record<string, unknown>,
  context: Partial<HandlerContext>
) {
  return harness.app.commandBus.dispatch(
    createEnvelope(Transports.HTTP, 'payments', payload, context)
  );
}

describe('payments', () => {
  let harness: TestHarness;
  let userId: string;

  beforeEach(async () => {
    harness = createTestHarness();
    const user = await harness.app.services.usersService.createUser({
      name: 'Payer',
      email: 'payer@example.com',
      metadata: {},
    });
    userId = user.id.value;
  });

  function charge(overrides: Record<string, unknown> = {}) {
    return dispatchPayments(
      harness,
      {
        user_id: userId,
        amount: '25.50',
        currency: 'USD',
        payment_method: 'credit_card',
        ...overrides,
      },
      { operation: 'process', correlationId: 'corr-pay-1' }
    );
  }

  describe('process', () => {
    it('rejects a charge for a user that does not exist without touching the gateway', async () => {
      const result = await charge({ user_id: 'ghost' });

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe(ErrorCode.NOT_FOUND);
      expect(result.message).toBe('User with ID ghost not found');
      expect(harness.payments.size).toBe(0);
      expect(harness.gateway.requests).toHaveLength(0);
    });

    it('completes an approved charge and publishes payment.completed', async () => {
      const result = await charge({ reference: 'order-7' });

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({
        user_id: userId,
        amount: 25.5,
        currency: 'USD',
        status: 'completed',
        transaction_id: 'txn_test_1',
        reference: 'order-7',
      });
      expect(harness.gateway.requests).toEqual([
        { amount: 25.5, currency: 'USD', paymentMethod: 'credit_card', reference: 'order-7' },
      ]);

      const [stored] = harness.payments.list();
      const completed = harness.events.ofType('payment.completed');
      expect(completed).toHaveLength(1);
      expect(completed[0].correlationId).toBe('corr-pay-1');
      expect(completed[0].payload).toEqual({
        payment_id: stored.id.value,
        user_id: userId,
        amount: '25.50',
        currency: 'USD',
        transaction_id: 'txn_test_1',
      });
    });

    it('records a decline as a failed payment', async () => {
      harness.gateway.next = { success: false, error: 'Insufficient funds' };

      const result = await charge();

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({ status: 'failed', failure_reason: 'Insufficient funds' });
      expect(harness.events.ofType('payment.failed')[0].payload).toMatchObject({
        user_id: userId,
        reason: 'Insufficient funds',
      });
      expect(harness.events.ofType('payment.completed')).toHaveLength(0);
    });

    it('treats an approval without a transaction id as a decline', async () => {
      harness.gateway.next = { success: true };

      const result = await charge();

      expect(result.data).toMatchObject({
        status: 'failed',
        failure_reason: 'Payment processing failed',
      });
    });

    it('marks the payment failed and reports INTERNAL_ERROR when the gateway throws', async () => {
      harness.gateway.next = new Error('connection reset');

      const result = await charge();

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe(ErrorCode.INTERNAL_ERROR);

      const [stored] = harness.payments.list();
      expect(stored.status).toBe('failed');
      expect(stored.failureReason).toBe('Gateway error: connection reset');
      expect(harness.events.ofType('payment.failed')).toHaveLength(0);
    });

    it('surfaces the gateway error when storing the failure also fails', async () => {
      harness.gateway.next = new Error('connection reset');
      // The move to processing is stored; the failed state is not
      jest
        .spyOn(harness.payments, 'update')
        .mockImplementationOnce(async (payment) => payment)
        .mockRejectedValueOnce(new Error('write conflict'));

      await expect(
        harness.app.services.paymentsService.processPayment({
          user_id: userId,
          amount: 10,
          currency: 'USD',
          payment_method: 'paypal',
          metadata: {},
        })
      ).rejects.toThrow('connection reset');
    });

    it('rejects an unsupported payment method before anything is stored', async () => {
      const result = await charge({ payment_method: 'cash' });

      expect(result.errorCode).toBe(ErrorCode.VALIDATION_ERROR);
      expect(result.message).toBe('Invalid payment method: cash');
      expect(harness.payments.size).toBe(0);
    });

    it('rejects a lowercase currency code', async () => {
      const result = await charge({ currency: 'usd' });

      expect(result.errorCode).toBe(ErrorCode.VALIDATION_ERROR);
      expect(result.message).toBe('currency: Currency must be 3-letter ISO code');
    });
  });

  describe('refund', () => {
    it('refunds a completed payment', async () => {
      await charge();
      const [payment] = harness.payments.list();

      const result = await dispatchPayments(
        harness,
        { reason: 'Customer request' },
        { operation: 'refund', paymentId: payment.id.value }
      );

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({
        status: 'refunded',
        metadata: { refund_reason: 'Customer request' },
      });
      expect(harness.events.ofType('payment.refunded')[0].payload).toEqual({
        payment_id: payment.id.value,
        user_id: userId,
        reason: 'Customer request',
      });
    });

    it('refuses to refund a failed payment', async () => {
      harness.gateway.next = { success: false, error: 'Card expired' };
      await charge();
      const [payment] = harness.payments.list();

      const result = await dispatchPayments(
        harness,
        { reason: 'Customer request' },
        { operation: 'refund', paymentId: payment.id.value }
      );

      expect(result.errorCode).toBe(ErrorCode.BUSINESS_RULE_VIOLATION);
      expect(result.message).toBe(
        'Business rule violation: Payment refund - Cannot refund payment with status failed'
      );
    });

    it('returns NOT_FOUND for an unknown payment', async () => {
      const result = await dispatchPayments(
        harness,
        { reason: 'Customer request' },
        { operation: 'refund', paymentId: 'nope' }
      );

      expect(result.errorCode).toBe(ErrorCode.NOT_FOUND);
      expect(result.message).toBe('Payment with ID nope not found');
    });
  });

  describe('get', () => {
    it('returns the stored payment', async () => {
      await charge();
      const [payment] = harness.payments.list();

      const result = await dispatchPayments(harness, {}, { operation: 'get', paymentId: payment.id.value });

      expect(result.data).toEqual(payment.toDict());
    });
  });
});
