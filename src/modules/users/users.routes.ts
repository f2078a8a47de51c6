import { Router } from 'express';
import { asyncHandler } from '../../shared/async-handler';
import { UsersController } from './users.controller';

/**
 * Creates user routes, mounted under /api/v1/users
 */
export function createUserRoutes(usersController: UsersController): Router {
  const router = Router();

  router.post('/', asyncHandler(usersController.createUser));
  router.get('/:userId', asyncHandler(usersController.getUser));
  router.put('/:userId', asyncHandler(usersController.updateUser));
  router.delete('/:userId', asyncHandler(usersController.deleteUser));

  return router;
}
