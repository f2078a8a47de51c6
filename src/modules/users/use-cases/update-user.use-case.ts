import {
  Age,
  EventPublisher,
  User,
  UserDomainService,
  UserId,
  UserName,
  UserRepository,
} from '../../../domain';
import { EventTypes } from '../../../shared/events';
import type { UpdateUserCommand } from '../users.schemas';

export interface UpdateUserContext {
  userRepo: UserRepository;
  userDomainService: UserDomainService;
  eventPublisher: EventPublisher;
}

/**
 * Apply the fields present in the command. Metadata entries are merged
 * into the existing map, not replaced.
 */
export async function updateUser(ctx: UpdateUserContext, command: UpdateUserCommand): Promise<User> {
  const user = await ctx.userDomainService.ensureUserExists(new UserId(command.user_id));
  const changes: Record<string, unknown> = {};

  if (command.name !== undefined) {
    user.updateName(new UserName(command.name));
    changes.name = command.name;
  }
  if (command.age !== undefined) {
    user.updateAge(new Age(command.age));
    changes.age = command.age;
  }
  if (command.metadata !== undefined) {
    for (const [key, value] of Object.entries(command.metadata)) {
      user.addMetadata(key, value);
    }
    changes.metadata = command.metadata;
  }

  const saved = await ctx.userRepo.update(user);

  await ctx.eventPublisher.publish(
    EventTypes.USER_UPDATED,
    { user_id: saved.id.value, changes },
    command.correlation_id
  );

  return saved;
}
