import { Payment, PaymentId, PaymentRecord, PaymentRepository, TransactionId } from '../../domain';
import { PaymentErrors } from '../../utils/exceptions';

export class InMemoryPaymentRepository implements PaymentRepository {
  private payments = new Map<string, PaymentRecord>();

  async create(payment: Payment): Promise<Payment> {
    const record = payment.toDict();
    if (this.payments.has(record.payment_id)) {
      throw PaymentErrors.alreadyExists(record.payment_id);
    }
    this.payments.set(record.payment_id, record);
    return Payment.fromDict(record);
  }

  async getById(paymentId: PaymentId): Promise<Payment | null> {
    const record = this.payments.get(paymentId.value);
    return record ? Payment.fromDict(record) : null;
  }

  async getByTransactionId(transactionId: TransactionId): Promise<Payment | null> {
    for (const record of this.payments.values()) {
      if (record.transaction_id === transactionId.value) {
        return Payment.fromDict(record);
      }
    }
    return null;
  }

  async update(payment: Payment): Promise<Payment> {
    const record = payment.toDict();
    if (!this.payments.has(record.payment_id)) {
      throw PaymentErrors.notFound(record.payment_id);
    }
    this.payments.set(record.payment_id, record);
    return Payment.fromDict(record);
  }

  async delete(paymentId: PaymentId): Promise<boolean> {
    if (!this.payments.delete(paymentId.value)) {
      throw PaymentErrors.notFound(paymentId.value);
    }
    return true;
  }

  /** Stored payments, oldest first. */
  list(): Payment[] {
    return [...this.payments.values()].map((record) => Payment.fromDict(record));
  }

  get size(): number {
    return this.payments.size;
  }
}
