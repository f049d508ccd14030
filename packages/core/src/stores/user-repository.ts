/**
 * A stored user. Timestamps are RFC 3339 strings.
 */
export interface User {
  id: number;
  name: string;
  email: string;
  createdAt: string;
  updatedAt: string;
}

export interface UserInput {
  name: string;
  email: string;
}

export interface PageRequest {
  /** 1-based page number. */
  page: number;
  limit: number;
}

export interface UserPage {
  users: Array<User>;
  total: number;
}

/**
 * Persistence for users. Implementations raise `USER_EMAIL_EXISTS` when an
 * insert or update would duplicate an e-mail address. A missing row is not an
 * error at this layer: lookups and updates return `undefined`.
 */
export interface UserRepository {
  create(input: UserInput): Promise<User>;
  getById(id: number): Promise<User | undefined>;
  update(id: number, input: UserInput): Promise<User | undefined>;
  /** Idempotent: deleting a missing user succeeds. */
  delete(id: number): Promise<void>;
  /** Users ordered by id ascending. */
  list(page: PageRequest): Promise<UserPage>;
}

export function pageOffset(page: PageRequest): number {
  return Math.max(0, (page.page - 1) * page.limit);
}
