import { Pool } from 'pg';
import {
  Metadata,
  Payment,
  PaymentId,
  PaymentRepository,
  PaymentStatus,
  TransactionId,
} from '../../domain';
import { PaymentErrors } from '../../utils/exceptions';
import { isUniqueViolation, withDbErrorHandling } from '../../utils/db-error-handler';

interface PaymentRow {
  id: string;
  user_id: string;
  // NUMERIC(12,2) arrives as a string from node-postgres
  amount: string;
  currency: string;
  payment_method: string;
  status: PaymentStatus;
  transaction_id: string | null;
  reference: string | null;
  failure_reason: string | null;
  metadata: Metadata | null;
  created_at: Date;
  updated_at: Date;
}

function paymentFromDatabase(row: PaymentRow): Payment {
  return Payment.fromDict({
    payment_id: row.id,
    user_id: row.user_id,
    amount: Number(row.amount),
    currency: row.currency,
    payment_method: row.payment_method,
    status: row.status,
    transaction_id: row.transaction_id,
    reference: row.reference,
    failure_reason: row.failure_reason,
    metadata: row.metadata ?? {},
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  });
}

export class PaymentsRepository implements PaymentRepository {
  constructor(private readonly db: Pool) {}

  async create(payment: Payment): Promise<Payment> {
    const record = payment.toDict();
    return withDbErrorHandling('create payment', async () => {
      try {
        const result = await this.db.query<PaymentRow>(
          `INSERT INTO payments (
            id, user_id, amount, currency, payment_method, status, transaction_id,
            reference, failure_reason, metadata, created_at, updated_at
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
          RETURNING *`,
          [
            record.payment_id,
            record.user_id,
            payment.money.formatAmount(),
            record.currency,
            record.payment_method,
            record.status,
            record.transaction_id,
            record.reference,
            record.failure_reason,
            JSON.stringify(record.metadata),
            record.created_at,
            record.updated_at,
          ]
        );
        return paymentFromDatabase(result.rows[0]);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw PaymentErrors.alreadyExists(record.payment_id);
        }
        throw error;
      }
    });
  }

  async getById(paymentId: PaymentId): Promise<Payment | null> {
    return withDbErrorHandling('get payment', async () => {
      const result = await this.db.query<PaymentRow>('SELECT * FROM payments WHERE id = $1', [
        paymentId.value,
      ]);
      return result.rows.length > 0 ? paymentFromDatabase(result.rows[0]) : null;
    });
  }

  async getByTransactionId(transactionId: TransactionId): Promise<Payment | null> {
    return withDbErrorHandling('get payment by transaction', async () => {
      const result = await this.db.query<PaymentRow>(
        'SELECT * FROM payments WHERE transaction_id = $1',
        [transactionId.value]
      );
      return result.rows.length > 0 ? paymentFromDatabase(result.rows[0]) : null;
    });
  }

  async update(payment: Payment): Promise<Payment> {
    const record = payment.toDict();
    return withDbErrorHandling('update payment', async () => {
      const result = await this.db.query<PaymentRow>(
        `UPDATE payments
         SET status = $2, transaction_id = $3, failure_reason = $4, metadata = $5, updated_at = $6
         WHERE id = $1
         RETURNING *`,
        [
          record.payment_id,
          record.status,
          record.transaction_id,
          record.failure_reason,
          JSON.stringify(record.metadata),
          record.updated_at,
        ]
      );
      if (result.rows.length === 0) {
        throw PaymentErrors.notFound(record.payment_id);
      }
      return paymentFromDatabase(result.rows[0]);
    });
  }

  async delete(paymentId: PaymentId): Promise<boolean> {
    return withDbErrorHandling('delete payment', async () => {
      const result = await this.db.query('DELETE FROM payments WHERE id = $1', [paymentId.value]);
      if (!result.rowCount) {
        throw PaymentErrors.notFound(paymentId.value);
      }
      return true;
    });
  }
}
