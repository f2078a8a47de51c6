import { UserId } from '../common/identifiers';
import { User } from './user.entity';
import { Email } from './value-objects';

/**
 * Storage contract for users.
 * `create` throws AlreadyExistsException on a duplicate id or email;
 * `update` and `delete` throw NotFoundException for a missing user.
 */
export interface UserRepository {
  create(user: User): Promise<User>;
  getById(userId: UserId): Promise<User | null>;
  getByEmail(email: Email): Promise<User | null>;
  update(user: User): Promise<User>;
  delete(userId: UserId): Promise<boolean>;
}
