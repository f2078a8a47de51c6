import { NextFunction } from 'express';
import { PaymentsController } from '../../../modules/payments/payments.controller';
import { createTestHarness, TestHarness } from '../../helpers/fakes';
import { createMockRequest, createMockResponse } from '../../helpers/http';

describe('PaymentsController', () => {
  let harness: TestHarness;
  let controller: PaymentsController;
  let next: NextFunction;
  let userId: string;

  beforeEach(async () => {
    harness = createTestHarness();
    controller = new PaymentsController(harness.app.commandBus);
    next = jest.fn();
    const user = await harness.app.services.usersService.createUser({
      name: 'Payer',
      email: 'payer@example.com',
      metadata: {},
    });
    userId = user.id.value;
  });

  const chargeBody = () => ({
    user_id: userId,
    amount: 99.99,
    currency: 'USD',
    payment_method: 'debit_card',
  });

  it('answers a declined charge with 201 and the failed payment', async () => {
    harness.gateway.next = { success: false, error: 'Insufficient funds' };
    const res = createMockResponse();

    await controller.processPayment(createMockRequest({ body: chargeBody() }), res, next);

    expect(res.status).toHaveBeenCalledWith(201);
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({
        success: true,
        data: expect.objectContaining({ status: 'failed', failure_reason: 'Insufficient funds' }),
      })
    );
  });

  it('answers a gateway outage with 500 and the generic message', async () => {
    harness.gateway.next = new Error('socket hang up');
    const res = createMockResponse();

    await controller.processPayment(createMockRequest({ body: chargeBody() }), res, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({
        success: false,
        error_code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred.',
      })
    );
  });

  it('maps a refund of a failed payment to 422', async () => {
    harness.gateway.next = { success: false, error: 'Insufficient funds' };
    await controller.processPayment(createMockRequest({ body: chargeBody() }), createMockResponse(), next);
    const [payment] = harness.payments.list();
    const res = createMockResponse();

    await controller.refundPayment(
      createMockRequest({ params: { paymentId: payment.id.value }, body: { reason: 'Duplicate' } }),
      res,
      next
    );

    expect(res.status).toHaveBeenCalledWith(422);
  });

  it('refunds the payment named in the path', async () => {
    await controller.processPayment(createMockRequest({ body: chargeBody() }), createMockResponse(), next);
    const [payment] = harness.payments.list();
    const res = createMockResponse();

    await controller.refundPayment(
      createMockRequest({ params: { paymentId: payment.id.value }, body: { reason: 'Duplicate' } }),
      res,
      next
    );

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({ data: expect.objectContaining({ status: 'refunded' }) })
    );
  });
});
