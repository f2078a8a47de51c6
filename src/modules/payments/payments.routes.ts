import { Router } from 'express';
import { asyncHandler } from '../../shared/async-handler';
import { PaymentsController } from './payments.controller';

/**
 * Creates payment routes, mounted under /api/v1/payments
 */
export function createPaymentRoutes(paymentsController: PaymentsController): Router {
  const router = Router();

  router.post('/', asyncHandler(paymentsController.processPayment));
  router.get('/:paymentId', asyncHandler(paymentsController.getPayment));
  router.post('/:paymentId/refund', asyncHandler(paymentsController.refundPayment));

  return router;
}
