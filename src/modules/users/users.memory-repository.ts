import { Email, User, UserId, UserRecord, UserRepository } from '../../domain';
import { AlreadyExistsException, UserErrors } from '../../utils/exceptions';

/**
 * Map-backed repository. Stores serialized snapshots, so an entity mutated
 * after a save does not change what is stored until it is saved again.
 */
export class InMemoryUserRepository implements UserRepository {
  private users = new Map<string, UserRecord>();

  async create(user: User): Promise<User> {
    const record = user.toDict();
    if (this.users.has(record.user_id)) {
      throw new AlreadyExistsException(`User with ID ${record.user_id} already exists`);
    }
    if (this.findRecordByEmail(record.email)) {
      throw UserErrors.alreadyExists(record.email);
    }
    this.users.set(record.user_id, record);
    return User.fromDict(record);
  }

  async getById(userId: UserId): Promise<User | null> {
    const record = this.users.get(userId.value);
    return record ? User.fromDict(record) : null;
  }

  async getByEmail(email: Email): Promise<User | null> {
    const record = this.findRecordByEmail(email.value);
    return record ? User.fromDict(record) : null;
  }

  async update(user: User): Promise<User> {
    const record = user.toDict();
    if (!this.users.has(record.user_id)) {
      throw UserErrors.notFound(record.user_id);
    }
    this.users.set(record.user_id, record);
    return User.fromDict(record);
  }

  async delete(userId: UserId): Promise<boolean> {
    if (!this.users.delete(userId.value)) {
      throw UserErrors.notFound(userId.value);
    }
    return true;
  }

  get size(): number {
    return this.users.size;
  }

  private findRecordByEmail(email: string): UserRecord | undefined {
    for (const record of this.users.values()) {
      if (record.email === email) return record;
    }
    return undefined;
  }
}
