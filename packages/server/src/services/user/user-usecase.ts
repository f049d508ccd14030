import {
  AppError,
  isErrorCode,
  type PageRequest,
  type User,
  type UserInput,
  type UserPage,
  type UserRepository,
} from '@callgate/core';

export class UserUsecase {
  constructor(private readonly users: UserRepository) {}

  async createUser(input: UserInput): Promise<User> {
    try {
      return await this.users.create(input);
    } catch (err) {
      throw this.translateConflict(err, input.email);
    }
  }

  async getUser(id: number): Promise<User> {
    const user = await this.users.getById(id);
    if (!user) throw this.notFound(id);
    return user;
  }

  async updateUser(id: number, input: UserInput): Promise<User> {
    let user: User | undefined;
    try {
      user = await this.users.update(id, input);
    } catch (err) {
      throw this.translateConflict(err, input.email);
    }
    if (!user) throw this.notFound(id);
    return user;
  }

  async deleteUser(id: number): Promise<void> {
    await this.users.delete(id);
  }

  async listUsers(page: PageRequest): Promise<UserPage> {
    return this.users.list(page);
  }

  private notFound(id: number): AppError {
    return new AppError('USER_NOT_FOUND', `user with ID ${id} not found`);
  }

  private translateConflict(err: unknown, email: string): unknown {
    if (isErrorCode(err, 'USER_EMAIL_EXISTS')) {
      return new AppError(
        'USER_EMAIL_EXISTS',
        `user with email ${email} already exists`,
        { cause: err },
      );
    }
    return err;
  }
}
