import { z } from 'zod';

/**
 * Zod schemas for user commands.
 * Field formats (email pattern, name length, age range) are checked again by
 * the domain value objects; these schemas fix the command shape.
 */

const correlationId = z.string().min(1).optional();
const metadata = z.record(z.unknown());

const userIdField = z
  .string({ required_error: 'Required' })
  .min(1, 'User ID cannot be empty');

const nameField = z
  .string()
  .min(1, 'Name cannot be empty')
  .max(100, 'Name cannot exceed 100 characters');

const ageField = z
  .number()
  .int('Age must be an integer')
  .min(0, 'Age cannot be negative')
  .max(150, 'Age cannot exceed 150');

/** Schema for creating a user */
export const createUserCommandSchema = z
  .object({
    name: nameField,
    email: z.string().min(1, 'Email cannot be empty'),
    age: ageField.nullable().optional(),
    metadata: metadata.default({}),
    correlation_id: correlationId,
  })
  .strict();

/** Schema for updating a user; only present fields change */
export const updateUserCommandSchema = z
  .object({
    user_id: userIdField,
    name: nameField.optional(),
    age: ageField.optional(),
    metadata: metadata.optional(),
    correlation_id: correlationId,
  })
  .strict();

/** Schema for delete and get */
export const userIdCommandSchema = z
  .object({
    user_id: userIdField,
    correlation_id: correlationId,
  })
  .strict();

export type CreateUserCommand = z.infer<typeof createUserCommandSchema>;
export type UpdateUserCommand = z.infer<typeof updateUserCommandSchema>;
export type DeleteUserCommand = z.infer<typeof userIdCommandSchema>;
export type GetUserCommand = z.infer<typeof userIdCommandSchema>;
