import { BusinessRuleViolationException, ValidationException } from '../../utils/exceptions';
import { PaymentId, TransactionId, UserId } from '../common/identifiers';
import { Metadata } from '../common/event-publisher.port';
import { nextTimestamp, parseTimestamp } from '../common/timestamps';
import { Money, PaymentMethod } from './value-objects';

export const PAYMENT_STATUSES = ['pending', 'processing', 'completed', 'failed', 'refunded'] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export function parsePaymentStatus(value: string): PaymentStatus {
  const status = PAYMENT_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new ValidationException(`Invalid payment status: ${value}`, 'status');
  }
  return status;
}

export interface PaymentRecord {
  payment_id: string;
  user_id: string;
  amount: number;
  currency: string;
  payment_method: string;
  status: PaymentStatus;
  transaction_id: string | null;
  reference: string | null;
  failure_reason: string | null;
  metadata: Metadata;
  created_at: string;
  updated_at: string;
}

export interface PaymentProps {
  id: PaymentId;
  userId: UserId;
  money: Money;
  paymentMethod: PaymentMethod;
  status?: PaymentStatus;
  transactionId?: TransactionId | null;
  reference?: string | null;
  failureReason?: string | null;
  metadata?: Metadata;
  createdAt?: Date;
  updatedAt?: Date;
}

const TRANSITION_RULE = 'Payment status transition';

/**
 * Payment aggregate.
 *
 * pending -> processing -> completed | failed
 * pending -> completed | failed
 * completed -> refunded
 *
 * Every guard runs before any field is touched, so a rejected transition
 * leaves the payment exactly as it was.
 */
export class Payment {
  readonly id: PaymentId;
  readonly userId: UserId;
  readonly money: Money;
  readonly paymentMethod: PaymentMethod;
  readonly reference: string | null;
  readonly createdAt: Date;
  private _status: PaymentStatus;
  private _transactionId: TransactionId | null;
  private _failureReason: string | null;
  private _metadata: Metadata;
  private _updatedAt: Date;

  constructor(props: PaymentProps) {
    this.id = props.id;
    this.userId = props.userId;
    this.money = props.money;
    this.paymentMethod = props.paymentMethod;
    this.reference = props.reference ?? null;
    this._status = props.status ?? 'pending';
    this._transactionId = props.transactionId ?? null;
    this._failureReason = props.failureReason ?? null;
    this._metadata = { ...(props.metadata ?? {}) };
    this.createdAt = props.createdAt ?? new Date();
    this._updatedAt = props.updatedAt ?? this.createdAt;
  }

  static create(props: Omit<PaymentProps, 'id' | 'status' | 'createdAt' | 'updatedAt'>): Payment {
    return new Payment({ ...props, id: PaymentId.generate(), status: 'pending' });
  }

  get status(): PaymentStatus {
    return this._status;
  }

  get transactionId(): TransactionId | null {
    return this._transactionId;
  }

  get failureReason(): string | null {
    return this._failureReason;
  }

  get metadata(): Metadata {
    return { ...this._metadata };
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  markAsProcessing(): void {
    if (this._status !== 'pending') {
      throw new BusinessRuleViolationException(
        TRANSITION_RULE,
        `Cannot mark as processing from ${this._status}`
      );
    }
    this._status = 'processing';
    this.touch();
  }

  markAsCompleted(transactionId: TransactionId): void {
    if (this._status !== 'pending' && this._status !== 'processing') {
      throw new BusinessRuleViolationException(
        TRANSITION_RULE,
        `Cannot complete payment from ${this._status}`
      );
    }
    this._status = 'completed';
    this._transactionId = transactionId;
    this._failureReason = null;
    this.touch();
  }

  markAsFailed(reason: string): void {
    if (this._status !== 'pending' && this._status !== 'processing') {
      throw new BusinessRuleViolationException(
        TRANSITION_RULE,
        `Cannot fail payment from ${this._status}`
      );
    }
    this._status = 'failed';
    this._failureReason = reason;
    this.touch();
  }

  canBeRefunded(): boolean {
    return this._status === 'completed';
  }

  refund(reason?: string): void {
    if (!this.canBeRefunded()) {
      throw new BusinessRuleViolationException(
        'Payment refund',
        `Cannot refund payment with status ${this._status}`
      );
    }
    this._status = 'refunded';
    if (reason) {
      this._metadata.refund_reason = reason;
    }
    this.touch();
  }

  toDict(): PaymentRecord {
    return {
      payment_id: this.id.value,
      user_id: this.userId.value,
      amount: this.money.amount,
      currency: this.money.currency,
      payment_method: this.paymentMethod.type,
      status: this._status,
      transaction_id: this._transactionId ? this._transactionId.value : null,
      reference: this.reference,
      failure_reason: this._failureReason,
      metadata: { ...this._metadata },
      created_at: this.createdAt.toISOString(),
      updated_at: this._updatedAt.toISOString(),
    };
  }

  static fromDict(record: PaymentRecord): Payment {
    return new Payment({
      id: new PaymentId(record.payment_id),
      userId: new UserId(record.user_id),
      money: Money.of(record.amount, record.currency),
      paymentMethod: new PaymentMethod(record.payment_method),
      status: parsePaymentStatus(record.status),
      transactionId: record.transaction_id ? new TransactionId(record.transaction_id) : null,
      reference: record.reference,
      failureReason: record.failure_reason,
      metadata: record.metadata,
      createdAt: parseTimestamp(record.created_at, 'created_at'),
      updatedAt: parseTimestamp(record.updated_at, 'updated_at'),
    });
  }

  private touch(): void {
    this._updatedAt = nextTimestamp(this._updatedAt);
  }
}
