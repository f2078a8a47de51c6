import { EventPublisher, UserDomainService, UserId, UserRepository } from '../../../domain';
import { EventTypes } from '../../../shared/events';
import type { DeleteUserCommand } from '../users.schemas';

export interface DeleteUserContext {
  userRepo: UserRepository;
  userDomainService: UserDomainService;
  eventPublisher: EventPublisher;
}

export async function deleteUser(ctx: DeleteUserContext, command: DeleteUserCommand): Promise<UserId> {
  const user = await ctx.userDomainService.ensureUserExists(new UserId(command.user_id));

  await ctx.userRepo.delete(user.id);

  await ctx.eventPublisher.publish(
    EventTypes.USER_DELETED,
    { user_id: user.id.value, email: user.email.value },
    command.correlation_id
  );

  return user.id;
}
