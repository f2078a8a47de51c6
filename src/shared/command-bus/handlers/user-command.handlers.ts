/**
 * User Command Handlers
 *
 * Route user sub-operations (create, update, delete, get) to UsersService.
 * One class per transport; they differ only in where the user id comes from.
 */

import { Operations, Transports } from '../../../domain/commands';
import type { UsersService } from '../../../modules/users/users.service';
import {
  createUserCommandSchema,
  updateUserCommandSchema,
  userIdCommandSchema,
} from '../../../modules/users/users.schemas';
import { BaseCommandHandler, OperationRoute, parseCommand } from '../base-command.handler';
import type { HandlerRegistration } from '../handler-registry';

abstract class UserCommandHandler extends BaseCommandHandler {
  protected readonly defaultOperation = 'create';

  constructor(private readonly usersService: UsersService) {
    super();
  }

  protected routes(): Record<string, OperationRoute> {
    return {
      create: async (data, context) => {
        const command = parseCommand(createUserCommandSchema, this.withCorrelation(data, context));
        const user = await this.usersService.createUser(command);
        return user.toDict();
      },
      update: async (data, context) => {
        const input = this.withEntityId(data, 'user_id', context.userId);
        const command = parseCommand(updateUserCommandSchema, this.withCorrelation(input, context));
        const user = await this.usersService.updateUser(command);
        return user.toDict();
      },
      delete: async (data, context) => {
        const input = this.withEntityId(data, 'user_id', context.userId);
        const command = parseCommand(userIdCommandSchema, this.withCorrelation(input, context));
        const userId = await this.usersService.deleteUser(command);
        return { user_id: userId.value };
      },
      get: async (data, context) => {
        const input = this.withEntityId(data, 'user_id', context.userId);
        const command = parseCommand(userIdCommandSchema, this.withCorrelation(input, context));
        const user = await this.usersService.getUser(command);
        return user.toDict();
      },
    };
  }
}

export class UserHttpCommandHandler extends UserCommandHandler {
  protected readonly transport = Transports.HTTP;
}

export class UserQueueCommandHandler extends UserCommandHandler {
  protected readonly transport = Transports.QUEUE;
}

export class UserStreamCommandHandler extends UserCommandHandler {
  protected readonly transport = Transports.STREAM;
}

/**
 * Get all user command handlers for registration.
 */
export function getUserCommandHandlers(usersService: UsersService): HandlerRegistration[] {
  return [
    {
      operation: Operations.USERS,
      transport: Transports.HTTP,
      factory: () => new UserHttpCommandHandler(usersService),
    },
    {
      operation: Operations.USERS,
      transport: Transports.QUEUE,
      factory: () => new UserQueueCommandHandler(usersService),
    },
    {
      operation: Operations.USERS,
      transport: Transports.STREAM,
      factory: () => new UserStreamCommandHandler(usersService),
    },
  ];
}
