export { createUser, CreateUserContext } from './create-user.use-case';
export { updateUser, UpdateUserContext } from './update-user.use-case';
export { deleteUser, DeleteUserContext } from './delete-user.use-case';
export { getUser, GetUserContext } from './get-user.use-case';
