import { ValidationException } from '../../utils/exceptions';

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;
const CURRENCY_PATTERN = /^[A-Z]{3}$/;

/**
 * Positive amount in a single currency, held in minor units (cents)
 * so arithmetic never goes through binary floating point.
 */
export class Money {
  private constructor(
    readonly minorUnits: number,
    readonly currency: string
  ) {}

  static of(amount: number | string, currency: string): Money {
    const text = typeof amount === 'number' ? amount.toString() : amount.trim();
    const numeric = Number(text);
    if (text === '' || !Number.isFinite(numeric)) {
      throw new ValidationException(`Invalid amount: ${text}`, 'amount');
    }
    if (numeric <= 0) {
      throw new ValidationException('Amount must be positive', 'amount');
    }

    const match = DECIMAL_PATTERN.exec(text);
    if (!match) {
      throw new ValidationException(`Invalid amount: ${text}`, 'amount');
    }
    const [, whole, fraction = ''] = match;
    if (fraction.length > 2) {
      throw new ValidationException('Amount cannot have more than 2 decimal places', 'amount');
    }

    return Money.fromMinorUnits(
      parseInt(whole, 10) * 100 + parseInt(fraction.padEnd(2, '0'), 10),
      currency
    );
  }

  static fromMinorUnits(minorUnits: number, currency: string): Money {
    if (!Number.isSafeInteger(minorUnits) || minorUnits <= 0) {
      throw new ValidationException('Amount must be positive', 'amount');
    }
    if (!CURRENCY_PATTERN.test(currency)) {
      throw new ValidationException('Currency must be 3-letter ISO code', 'currency');
    }
    return new Money(minorUnits, currency);
  }

  get amount(): number {
    return this.minorUnits / 100;
  }

  /** Amount with exactly two decimals, e.g. "99.90". */
  formatAmount(): string {
    const whole = Math.floor(this.minorUnits / 100);
    const cents = (this.minorUnits % 100).toString().padStart(2, '0');
    return `${whole}.${cents}`;
  }

  add(other: Money): Money {
    if (other.currency !== this.currency) {
      throw new ValidationException('Cannot add different currencies', 'currency');
    }
    return Money.fromMinorUnits(this.minorUnits + other.minorUnits, this.currency);
  }

  equals(other: Money): boolean {
    return other.minorUnits === this.minorUnits && other.currency === this.currency;
  }

  toString(): string {
    return `${this.formatAmount()} ${this.currency}`;
  }
}

export const PAYMENT_METHOD_TYPES = ['credit_card', 'debit_card', 'paypal', 'bank_transfer'] as const;

export type PaymentMethodType = (typeof PAYMENT_METHOD_TYPES)[number];

function isPaymentMethodType(value: string): value is PaymentMethodType {
  return (PAYMENT_METHOD_TYPES as readonly string[]).includes(value);
}

export class PaymentMethod {
  readonly type: PaymentMethodType;

  constructor(
    type: string,
    readonly details?: string
  ) {
    if (!isPaymentMethodType(type)) {
      throw new ValidationException(`Invalid payment method: ${type}`, 'payment_method');
    }
    this.type = type;
  }

  toString(): string {
    return this.type;
  }
}
