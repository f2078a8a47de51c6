import { User, UserDomainService, UserId } from '../../../domain';
import type { GetUserCommand } from '../users.schemas';

export interface GetUserContext {
  userDomainService: UserDomainService;
}

export async function getUser(ctx: GetUserContext, command: GetUserCommand): Promise<User> {
  return ctx.userDomainService.ensureUserExists(new UserId(command.user_id));
}
