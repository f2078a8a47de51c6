import { UserErrors } from '../../utils/exceptions';
import { UserId } from '../common/identifiers';
import { User } from './user.entity';
import { UserRepository } from './user.ports';
import { Email } from './value-objects';

/**
 * Cross-aggregate user rules that need the repository.
 */
export class UserDomainService {
  constructor(private readonly userRepo: UserRepository) {}

  async ensureUniqueEmail(email: Email): Promise<void> {
    const existing = await this.userRepo.getByEmail(email);
    if (existing) {
      throw UserErrors.alreadyExists(email.value);
    }
  }

  async ensureUserExists(userId: UserId): Promise<User> {
    const user = await this.userRepo.getById(userId);
    if (!user) {
      throw UserErrors.notFound(userId.value);
    }
    return user;
  }
}
