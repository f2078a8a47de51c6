import { PaymentId, TransactionId } from '../common/identifiers';
import { Payment } from './payment.entity';

export interface PaymentRepository {
  create(payment: Payment): Promise<Payment>;
  getById(paymentId: PaymentId): Promise<Payment | null>;
  getByTransactionId(transactionId: TransactionId): Promise<Payment | null>;
  update(payment: Payment): Promise<Payment>;
  delete(paymentId: PaymentId): Promise<boolean>;
}

export interface GatewayChargeRequest {
  amount: number;
  currency: string;
  paymentMethod: string;
  reference?: string;
}

/**
 * A declined charge is `success: false` with an error; a thrown exception
 * means the gateway itself could not be reached.
 */
export interface GatewayChargeResult {
  success: boolean;
  transactionId?: string;
  error?: string;
}

export interface PaymentGateway {
  process(request: GatewayChargeRequest): Promise<GatewayChargeResult>;
}
