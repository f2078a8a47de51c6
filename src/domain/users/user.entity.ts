import { UserId } from '../common/identifiers';
import { Metadata } from '../common/event-publisher.port';
import { nextTimestamp, parseTimestamp } from '../common/timestamps';
import { Age, Email, UserName } from './value-objects';

/**
 * Serialized user, as returned to callers and stored by repositories.
 */
export interface UserRecord {
  user_id: string;
  name: string;
  email: string;
  age: number | null;
  metadata: Metadata;
  created_at: string;
  updated_at: string;
}

export interface UserProps {
  id: UserId;
  name: UserName;
  email: Email;
  age?: Age | null;
  metadata?: Metadata;
  createdAt?: Date;
  updatedAt?: Date;
}

export class User {
  readonly id: UserId;
  readonly email: Email;
  readonly createdAt: Date;
  private _name: UserName;
  private _age: Age | null;
  private _metadata: Metadata;
  private _updatedAt: Date;

  constructor(props: UserProps) {
    const now = new Date();
    this.id = props.id;
    this.email = props.email;
    this._name = props.name;
    this._age = props.age ?? null;
    this._metadata = { ...(props.metadata ?? {}) };
    this.createdAt = props.createdAt ?? now;
    this._updatedAt = props.updatedAt ?? this.createdAt;
  }

  static create(props: Omit<UserProps, 'id' | 'createdAt' | 'updatedAt'>): User {
    return new User({ ...props, id: UserId.generate() });
  }

  get name(): UserName {
    return this._name;
  }

  get age(): Age | null {
    return this._age;
  }

  get metadata(): Metadata {
    return { ...this._metadata };
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  updateName(name: UserName): void {
    this._name = name;
    this.touch();
  }

  updateAge(age: Age): void {
    this._age = age;
    this.touch();
  }

  addMetadata(key: string, value: unknown): void {
    this._metadata[key] = value;
    this.touch();
  }

  toDict(): UserRecord {
    return {
      user_id: this.id.value,
      name: this._name.value,
      email: this.email.value,
      age: this._age ? this._age.value : null,
      metadata: { ...this._metadata },
      created_at: this.createdAt.toISOString(),
      updated_at: this._updatedAt.toISOString(),
    };
  }

  static fromDict(record: UserRecord): User {
    return new User({
      id: new UserId(record.user_id),
      name: new UserName(record.name),
      email: new Email(record.email),
      age: record.age === null ? null : new Age(record.age),
      metadata: record.metadata,
      createdAt: parseTimestamp(record.created_at, 'created_at'),
      updatedAt: parseTimestamp(record.updated_at, 'updated_at'),
    });
  }

  private touch(): void {
    this._updatedAt = nextTimestamp(this._updatedAt);
  }
}
