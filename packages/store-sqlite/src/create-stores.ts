import Database from 'better-sqlite3';
import {
  SQLiteUserRepository,
  type SQLiteUserRepositoryOptions,
} from './sqlite-user-repository.js';

export interface CreateSQLiteStoresOptions {
  /** File path for the shared database. Defaults to `':memory:'`. */
  database?: string;
  /** Options for the user repository (excluding `database`). */
  users?: Omit<SQLiteUserRepositoryOptions, 'database'>;
}

export interface SQLiteStores {
  users: SQLiteUserRepository;
  /** Close all stores and the shared database connection. */
  close(): Promise<void>;
}

/**
 * Creates the SQLite-backed repositories sharing a single database
 * connection. The factory owns the connection and closes it in `close()`.
 */
export function createSQLiteStores(
  options: CreateSQLiteStoresOptions = {},
): SQLiteStores {
  const db = new Database(options.database ?? ':memory:');
  const users = new SQLiteUserRepository({ ...options.users, database: db });

  return {
    users,
    async close() {
      await users.close();
      db.close();
    },
  };
}
