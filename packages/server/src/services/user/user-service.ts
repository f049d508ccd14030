import type { User } from '@callgate/core';
import type { ServiceDefinition } from '../../rpc/rpc-server.js';
import { parseRequest } from '../validation.js';
import {
  CreateUserRequestSchema,
  DeleteUserRequestSchema,
  GetUserRequestSchema,
  ListUsersRequestSchema,
  UpdateUserRequestSchema,
} from './user-schemas.js';
import type { UserUsecase } from './user-usecase.js';

export const USER_SERVICE_NAME = 'user.UserService';

export interface UserResponse {
  user: User;
}

export interface ListUsersResponse {
  users: Array<User>;
  pagination: { total: number; page: number; limit: number };
}

export function createUserService(usecase: UserUsecase): ServiceDefinition {
  return {
    name: USER_SERVICE_NAME,
    methods: {
      async CreateUser(ctx, request): Promise<UserResponse> {
        const { user } = parseRequest(CreateUserRequestSchema, request);
        const created = await usecase.createUser(user);
        ctx.logger.info('user created', { user_id: created.id });
        return { user: created };
      },

      async GetUser(_ctx, request): Promise<UserResponse> {
        const { id } = parseRequest(GetUserRequestSchema, request);
        return { user: await usecase.getUser(id) };
      },

      async UpdateUser(ctx, request): Promise<UserResponse> {
        const { user } = parseRequest(UpdateUserRequestSchema, request);
        const updated = await usecase.updateUser(user.id, {
          name: user.name,
          email: user.email,
        });
        ctx.logger.info('user updated', { user_id: updated.id });
        return { user: updated };
      },

      async DeleteUser(ctx, request): Promise<Record<string, never>> {
        const { id } = parseRequest(DeleteUserRequestSchema, request);
        await usecase.deleteUser(id);
        ctx.logger.info('user deleted', { user_id: id });
        return {};
      },

      async ListUsers(_ctx, request): Promise<ListUsersResponse> {
        const { pagination } = parseRequest(ListUsersRequestSchema, request);
        const { users, total } = await usecase.listUsers(pagination);
        return {
          users,
          pagination: { total, page: pagination.page, limit: pagination.limit },
        };
      },
    },
  };
}
