import { v4 as uuidv4 } from 'uuid';
import { ValidationException } from '../../utils/exceptions';

/**
 * Opaque, non-blank string identifier compared by value.
 */
abstract class Identifier {
  readonly value: string;

  protected constructor(value: string, label: string, field: string) {
    if (!value || !value.trim()) {
      throw new ValidationException(`${label} cannot be empty`, field);
    }
    this.value = value;
  }

  equals(other: Identifier): boolean {
    return other.constructor === this.constructor && other.value === this.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

export class UserId extends Identifier {
  constructor(value: string) {
    super(value, 'User ID', 'user_id');
  }

  static generate(): UserId {
    return new UserId(uuidv4());
  }
}

export class PaymentId extends Identifier {
  constructor(value: string) {
    super(value, 'Payment ID', 'payment_id');
  }

  static generate(): PaymentId {
    return new PaymentId(uuidv4());
  }
}

export class NotificationId extends Identifier {
  constructor(value: string) {
    super(value, 'Notification ID', 'notification_id');
  }

  static generate(): NotificationId {
    return new NotificationId(uuidv4());
  }
}

export class TransactionId extends Identifier {
  constructor(value: string) {
    super(value, 'Transaction ID', 'transaction_id');
  }
}
