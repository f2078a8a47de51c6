import { ValidationException } from '../../utils/exceptions';

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const MAX_NAME_LENGTH = 100;
export const MAX_AGE = 150;

export class Email {
  readonly value: string;

  constructor(value: string) {
    if (!EMAIL_PATTERN.test(value)) {
      throw new ValidationException(`Invalid email format: ${value}`, 'email');
    }
    this.value = value;
  }

  equals(other: Email): boolean {
    return other.value === this.value;
  }

  toString(): string {
    return this.value;
  }
}

export class UserName {
  readonly value: string;

  constructor(value: string) {
    if (!value || !value.trim()) {
      throw new ValidationException('User name cannot be empty', 'name');
    }
    if (value.length > MAX_NAME_LENGTH) {
      throw new ValidationException(`User name cannot exceed ${MAX_NAME_LENGTH} characters`, 'name');
    }
    this.value = value;
  }

  toString(): string {
    return this.value;
  }
}

export class Age {
  readonly value: number;

  constructor(value: number) {
    if (!Number.isInteger(value)) {
      throw new ValidationException('Age must be an integer', 'age');
    }
    if (value < 0) {
      throw new ValidationException('Age cannot be negative', 'age');
    }
    if (value > MAX_AGE) {
      throw new ValidationException(`Age cannot exceed ${MAX_AGE}`, 'age');
    }
    this.value = value;
  }
}
