import {
  AppError,
  pageOffset,
  type PageRequest,
  type User,
  type UserInput,
  type UserPage,
  type UserRepository,
} from '@callgate/core';
import Database from 'better-sqlite3';
import { MIGRATIONS, USERS_TABLE, type UserRow } from './schema.js';

export interface SQLiteUserRepositoryOptions {
  /** File path or an open connection. Defaults to `':memory:'`. */
  database?: string | Database.Database;
  now?: () => Date;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    err.code === 'SQLITE_CONSTRAINT_UNIQUE'
  );
}

/**
 * {@link UserRepository} backed by a `users` table. When given a path the
 * repository owns the connection and closes it in {@link close}; a passed-in
 * connection is left open.
 */
export class SQLiteUserRepository implements UserRepository {
  private readonly db: Database.Database;
  private readonly ownsDatabase: boolean;
  private readonly now: () => Date;

  private readonly insertStmt: Database.Statement<
    [string, string, string, string],
    UserRow
  >;
  private readonly selectStmt: Database.Statement<[number], UserRow>;
  private readonly updateStmt: Database.Statement<
    [string, string, string, number],
    UserRow
  >;
  private readonly deleteStmt: Database.Statement<[number]>;
  private readonly pageStmt: Database.Statement<[number, number], UserRow>;
  private readonly countStmt: Database.Statement<[], { total: number }>;

  constructor(options: SQLiteUserRepositoryOptions = {}) {
    const database = options.database ?? ':memory:';
    if (typeof database === 'string') {
      this.db = new Database(database);
      this.ownsDatabase = true;
    } else {
      this.db = database;
      this.ownsDatabase = false;
    }
    this.now = options.now ?? (() => new Date());

    for (const migration of MIGRATIONS) {
      this.db.exec(migration);
    }

    this.insertStmt = this.db.prepare<[string, string, string, string], UserRow>(
      `INSERT INTO ${USERS_TABLE} (name, email, created_at, updated_at)
       VALUES (?, ?, ?, ?) RETURNING *`,
    );
    this.selectStmt = this.db.prepare<[number], UserRow>(
      `SELECT * FROM ${USERS_TABLE} WHERE id = ?`,
    );
    this.updateStmt = this.db.prepare<[string, string, string, number], UserRow>(
      `UPDATE ${USERS_TABLE} SET name = ?, email = ?, updated_at = ?
       WHERE id = ? RETURNING *`,
    );
    this.deleteStmt = this.db.prepare<[number]>(
      `DELETE FROM ${USERS_TABLE} WHERE id = ?`,
    );
    this.pageStmt = this.db.prepare<[number, number], UserRow>(
      `SELECT * FROM ${USERS_TABLE} ORDER BY id ASC LIMIT ? OFFSET ?`,
    );
    this.countStmt = this.db.prepare<[], { total: number }>(
      `SELECT COUNT(*) AS total FROM ${USERS_TABLE}`,
    );
  }

  async create(input: UserInput): Promise<User> {
    const timestamp = this.now().toISOString();
    let row: UserRow | undefined;
    try {
      row = this.insertStmt.get(input.name, input.email, timestamp, timestamp);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new AppError('USER_EMAIL_EXISTS', undefined, { cause: err });
      }
      throw err;
    }
    if (!row) {
      throw new AppError('INTERNAL', 'insert returned no row');
    }
    return toUser(row);
  }

  async getById(id: number): Promise<User | undefined> {
    const row = this.selectStmt.get(id);
    return row ? toUser(row) : undefined;
  }

  async update(id: number, input: UserInput): Promise<User | undefined> {
    try {
      const row = this.updateStmt.get(
        input.name,
        input.email,
        this.now().toISOString(),
        id,
      );
      return row ? toUser(row) : undefined;
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new AppError('USER_EMAIL_EXISTS', undefined, { cause: err });
      }
      throw err;
    }
  }

  async delete(id: number): Promise<void> {
    this.deleteStmt.run(id);
  }

  async list(page: PageRequest): Promise<UserPage> {
    const rows = this.pageStmt.all(page.limit, pageOffset(page));
    const total = this.countStmt.get()?.total ?? 0;
    return { users: rows.map(toUser), total };
  }

  async close(): Promise<void> {
    if (this.ownsDatabase && this.db.open) {
      this.db.close();
    }
  }
}
