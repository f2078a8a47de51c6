import { Request, Response, NextFunction } from 'express';
import { Operations } from '../../domain/commands';
import type { CommandBus } from '../../shared/command-bus/command-bus';
import { buildHttpEnvelope, renderResult, requireBody, requireParam } from '../../utils/controller-helpers';

export class UsersController {
  constructor(private readonly commandBus: CommandBus) {}

  /**
   * POST /api/v1/users
   */
  createUser = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const envelope = buildHttpEnvelope(req, Operations.USERS, 'create', requireBody(req));
      renderResult(res, await this.commandBus.dispatch(envelope), 201);
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/v1/users/:userId
   */
  getUser = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const envelope = buildHttpEnvelope(req, Operations.USERS, 'get', {}, {
        userId: requireParam(req, 'userId'),
      });
      renderResult(res, await this.commandBus.dispatch(envelope));
    } catch (error) {
      next(error);
    }
  };

  /**
   * PUT /api/v1/users/:userId
   * Only the fields present in the body change.
   */
  updateUser = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const envelope = buildHttpEnvelope(req, Operations.USERS, 'update', requireBody(req), {
        userId: requireParam(req, 'userId'),
      });
      renderResult(res, await this.commandBus.dispatch(envelope));
    } catch (error) {
      next(error);
    }
  };

  /**
   * DELETE /api/v1/users/:userId
   */
  deleteUser = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const envelope = buildHttpEnvelope(req, Operations.USERS, 'delete', {}, {
        userId: requireParam(req, 'userId'),
      });
      renderResult(res, await this.commandBus.dispatch(envelope));
    } catch (error) {
      next(error);
    }
  };
}
