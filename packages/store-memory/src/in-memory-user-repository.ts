import {
  AppError,
  pageOffset,
  type PageRequest,
  type User,
  type UserInput,
  type UserPage,
  type UserRepository,
} from '@callgate/core';

export interface InMemoryUserRepositoryOptions {
  /** Timestamp source for `createdAt` / `updatedAt`. */
  now?: () => Date;
}

/**
 * Map-backed {@link UserRepository}. Ids are assigned sequentially from 1 and
 * never reused, matching an auto-increment column.
 */
export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<number, User>();
  private readonly now: () => Date;
  private nextId = 1;

  constructor(options: InMemoryUserRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async create(input: UserInput): Promise<User> {
    this.assertEmailAvailable(input.email);

    const timestamp = this.now().toISOString();
    const user: User = {
      id: this.nextId++,
      name: input.name,
      email: input.email,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.users.set(user.id, user);
    return { ...user };
  }

  async getById(id: number): Promise<User | undefined> {
    const user = this.users.get(id);
    return user ? { ...user } : undefined;
  }

  async update(id: number, input: UserInput): Promise<User | undefined> {
    const existing = this.users.get(id);
    if (!existing) return undefined;

    this.assertEmailAvailable(input.email, id);

    const updated: User = {
      ...existing,
      name: input.name,
      email: input.email,
      updatedAt: this.now().toISOString(),
    };
    this.users.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<void> {
    this.users.delete(id);
  }

  async list(page: PageRequest): Promise<UserPage> {
    const all = Array.from(this.users.values()).sort((a, b) => a.id - b.id);
    const offset = pageOffset(page);
    return {
      users: all.slice(offset, offset + page.limit).map((u) => ({ ...u })),
      total: all.length,
    };
  }

  /** Number of stored users. */
  get size(): number {
    return this.users.size;
  }

  private assertEmailAvailable(email: string, exceptId?: number): void {
    for (const user of this.users.values()) {
      if (user.email === email && user.id !== exceptId) {
        throw new AppError('USER_EMAIL_EXISTS');
      }
    }
  }
}
