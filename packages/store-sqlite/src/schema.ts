export const USERS_TABLE = 'users';

export const MIGRATIONS: ReadonlyArray<string> = [
  `CREATE TABLE IF NOT EXISTS ${USERS_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    email TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email ON ${USERS_TABLE} (email)`,
];

/** Row shape as stored; columns are snake_case. */
export interface UserRow {
  id: number;
  name: string;
  email: string;
  created_at: string;
  updated_at: string;
}
