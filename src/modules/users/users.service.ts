import {
  EventPublisher,
  NotificationRepository,
  User,
  UserDomainService,
  UserId,
  UserRepository,
} from '../../domain';
import { createUser, deleteUser, getUser, updateUser } from './use-cases';
import type {
  CreateUserCommand,
  DeleteUserCommand,
  GetUserCommand,
  UpdateUserCommand,
} from './users.schemas';

/**
 * Entry point for user use cases. Holds the ports each use case needs.
 */
export class UsersService {
  private readonly userDomainService: UserDomainService;

  constructor(
    private readonly userRepo: UserRepository,
    private readonly notificationRepo: NotificationRepository,
    private readonly eventPublisher: EventPublisher,
    private readonly appName: string
  ) {
    this.userDomainService = new UserDomainService(userRepo);
  }

  async createUser(command: CreateUserCommand): Promise<User> {
    return createUser(
      {
        userRepo: this.userRepo,
        notificationRepo: this.notificationRepo,
        userDomainService: this.userDomainService,
        eventPublisher: this.eventPublisher,
        appName: this.appName,
      },
      command
    );
  }

  async updateUser(command: UpdateUserCommand): Promise<User> {
    return updateUser(this.writeContext(), command);
  }

  async deleteUser(command: DeleteUserCommand): Promise<UserId> {
    return deleteUser(this.writeContext(), command);
  }

  async getUser(command: GetUserCommand): Promise<User> {
    return getUser({ userDomainService: this.userDomainService }, command);
  }

  private writeContext() {
    return {
      userRepo: this.userRepo,
      userDomainService: this.userDomainService,
      eventPublisher: this.eventPublisher,
    };
  }
}
