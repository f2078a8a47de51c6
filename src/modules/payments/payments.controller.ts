import { Request, Response, NextFunction } from 'express';
import { Operations } from '../../domain/commands';
import type { CommandBus } from '../../shared/command-bus/command-bus';
import { buildHttpEnvelope, renderResult, requireBody, requireParam } from '../../utils/controller-helpers';

export class PaymentsController {
  constructor(private readonly commandBus: CommandBus) {}

  /**
   * POST /api/v1/payments
   * A declined charge is still a 201: the body carries the failed payment.
   */
  processPayment = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const envelope = buildHttpEnvelope(req, Operations.PAYMENTS, 'process', requireBody(req));
      renderResult(res, await this.commandBus.dispatch(envelope), 201);
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/v1/payments/:paymentId
   */
  getPayment = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const envelope = buildHttpEnvelope(req, Operations.PAYMENTS, 'get', {}, {
        paymentId: requireParam(req, 'paymentId'),
      });
      renderResult(res, await this.commandBus.dispatch(envelope));
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/v1/payments/:paymentId/refund
   */
  refundPayment = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const envelope = buildHttpEnvelope(req, Operations.PAYMENTS, 'refund', requireBody(req), {
        paymentId: requireParam(req, 'paymentId'),
      });
      renderResult(res, await this.commandBus.dispatch(envelope));
    } catch (error) {
      next(error);
    }
  };
}
