import { logger } from '../../../config/logger.config';
import {
  Age,
  Email,
  EventPublisher,
  Notification,
  NotificationContent,
  NotificationRepository,
  Recipient,
  User,
  UserDomainService,
  UserName,
  UserRepository,
} from '../../../domain';
import { EventTypes } from '../../../shared/events';
import type { CreateUserCommand } from '../users.schemas';

export interface CreateUserContext {
  userRepo: UserRepository;
  notificationRepo: NotificationRepository;
  userDomainService: UserDomainService;
  eventPublisher: EventPublisher;
  appName: string;
}

/**
 * Create a user, queue a welcome notification for them, and publish
 * `user.created`.
 *
 * The welcome notification is best effort: if it cannot be stored the user
 * is still created.
 */
export async function createUser(ctx: CreateUserContext, command: CreateUserCommand): Promise<User> {
  const name = new UserName(command.name);
  const email = new Email(command.email);
  const age = command.age === null || command.age === undefined ? null : new Age(command.age);

  await ctx.userDomainService.ensureUniqueEmail(email);

  const user = await ctx.userRepo.create(
    User.create({ name, email, age, metadata: command.metadata })
  );

  try {
    await ctx.notificationRepo.create(
      Notification.create({
        recipient: new Recipient(email.value, 'email'),
        content: new NotificationContent(
          `Welcome to ${ctx.appName}!`,
          `Hello ${name.value}, welcome to our platform!`
        ),
        userId: user.id,
        metadata: { type: 'welcome' },
      })
    );
  } catch (error) {
    logger.warn('Failed to store welcome notification', {
      userId: user.id.value,
      correlationId: command.correlation_id,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  await ctx.eventPublisher.publish(
    EventTypes.USER_CREATED,
    { user_id: user.id.value, name: name.value, email: email.value },
    command.correlation_id
  );

  return user;
}
