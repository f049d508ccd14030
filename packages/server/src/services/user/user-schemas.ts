import { z } from 'zod';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_LIMIT = 10;
export const MAX_PAGE_LIMIT = 100;

const userId = z
  .number({
    required_error: 'id is required',
    invalid_type_error: 'id must be a number',
  })
  .int('id must be an integer')
  .positive('id must be a positive integer');

const userName = z
  .string({ required_error: 'name is required' })
  .min(1, 'name is required')
  .max(255, 'name must be at most 255 characters');

const userEmail = z
  .string({ required_error: 'email is required' })
  .email('email must be a valid email address');

export const CreateUserRequestSchema = z.object({
  user: z.object(
    { name: userName, email: userEmail },
    { required_error: 'user is required' },
  ),
});

export const GetUserRequestSchema = z.object({ id: userId });

export const UpdateUserRequestSchema = z.object({
  user: z.object(
    { id: userId, name: userName, email: userEmail },
    { required_error: 'user is required' },
  ),
});

export const DeleteUserRequestSchema = z.object({ id: userId });

export const ListUsersRequestSchema = z.object({
  pagination: z
    .object({
      page: z
        .number()
        .int('page must be an integer')
        .min(1, 'page must be at least 1')
        .default(DEFAULT_PAGE),
      limit: z
        .number()
        .int('limit must be an integer')
        .min(1, 'limit must be at least 1')
        .max(MAX_PAGE_LIMIT, `limit must be at most ${MAX_PAGE_LIMIT}`)
        .default(DEFAULT_PAGE_LIMIT),
    })
    .default({}),
});

export type CreateUserRequest = z.input<typeof CreateUserRequestSchema>;
export type GetUserRequest = z.input<typeof GetUserRequestSchema>;
export type UpdateUserRequest = z.input<typeof UpdateUserRequestSchema>;
export type DeleteUserRequest = z.input<typeof DeleteUserRequestSchema>;
export type ListUsersRequest = z.input<typeof ListUsersRequestSchema>;
