/**
 * Payment Command Handlers
 *
 * Route payment sub-operations (process, refund, get) to PaymentsService.
 */

import { Operations, Transports } from '../../../domain/commands';
import type { PaymentsService } from '../../../modules/payments/payments.service';
import {
  getPaymentCommandSchema,
  processPaymentCommandSchema,
  refundPaymentCommandSchema,
} from '../../../modules/payments/payments.schemas';
import { BaseCommandHandler, OperationRoute, parseCommand } from '../base-command.handler';
import type { HandlerRegistration } from '../handler-registry';

abstract class PaymentCommandHandler extends BaseCommandHandler {
  protected readonly defaultOperation = 'process';

  constructor(private readonly paymentsService: PaymentsService) {
    super();
  }

  protected routes(): Record<string, OperationRoute> {
    return {
      process: async (data, context) => {
        const command = parseCommand(processPaymentCommandSchema, this.withCorrelation(data, context));
        const payment = await this.paymentsService.processPayment(command);
        return payment.toDict();
      },
      refund: async (data, context) => {
        const input = this.withEntityId(data, 'payment_id', context.paymentId);
        const command = parseCommand(refundPaymentCommandSchema, this.withCorrelation(input, context));
        const payment = await this.paymentsService.refundPayment(command);
        return payment.toDict();
      },
      get: async (data, context) => {
        const input = this.withEntityId(data, 'payment_id', context.paymentId);
        const command = parseCommand(getPaymentCommandSchema, this.withCorrelation(input, context));
        const payment = await this.paymentsService.getPayment(command);
        return payment.toDict();
      },
    };
  }
}

export class PaymentHttpCommandHandler extends PaymentCommandHandler {
  protected readonly transport = Transports.HTTP;
}

export class PaymentQueueCommandHandler extends PaymentCommandHandler {
  protected readonly transport = Transports.QUEUE;
}

export class PaymentStreamCommandHandler extends PaymentCommandHandler {
  protected readonly transport = Transports.STREAM;
}

export function getPaymentCommandHandlers(paymentsService: PaymentsService): HandlerRegistration[] {
  return [
    {
      operation: Operations.PAYMENTS,
      transport: Transports.HTTP,
      factory: () => new PaymentHttpCommandHandler(paymentsService),
    },
    {
      operation: Operations.PAYMENTS,
      transport: Transports.QUEUE,
      factory: () => new PaymentQueueCommandHandler(paymentsService),
    },
    {
      operation: Operations.PAYMENTS,
      transport: Transports.STREAM,
      factory: () => new PaymentStreamCommandHandler(paymentsService),
    },
  ];
}
