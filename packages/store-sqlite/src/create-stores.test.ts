import fs from 'fs';
import os from 'os';
import path from 'path';
import Database from 'better-sqlite3';
import { describe, it, expect, afterEach } from 'vitest';
import { createSQLiteStores } from './create-stores.js';
import { SQLiteUserRepository } from './sqlite-user-repository.js';

describe('createSQLiteStores', () => {
  const testDbPath = path.join(os.tmpdir(), `callgate-stores-${process.pid}.db`);
  let cleanup: (() => Promise<void>) | undefined;

  afterEach(async () => {
    if (cleanup) {
      await cleanup();
      cleanup = undefined;
    }
    if (fs.existsSync(testDbPath)) {
      fs.unlinkSync(testDbPath);
    }
  });

  it('returns the user repository', () => {
    const stores = createSQLiteStores();
    cleanup = () => stores.close();

    expect(stores.users).toBeInstanceOf(SQLiteUserRepository);
  });

  it('writes to the given database file', async () => {
    const stores = createSQLiteStores({ database: testDbPath });
    cleanup = () => stores.close();

    await stores.users.create({ name: 'Ada', email: 'ada@example.com' });

    const db = new Database(testDbPath);
    try {
      const row = db
        .prepare('SELECT * FROM users WHERE email = ?')
        .get('ada@example.com');
      expect(row).toBeDefined();
    } finally {
      db.close();
    }
  });

  it('passes repository options through', async () => {
    const stores = createSQLiteStores({
      users: { now: () => new Date('2024-01-01T00:00:00.000Z') },
    });
    cleanup = () => stores.close();

    const user = await stores.users.create({ name: 'Ada', email: 'ada@example.com' });
    expect(user.createdAt).toBe('2024-01-01T00:00:00.000Z');
  });

  it('close() closes the shared connection', async () => {
    const stores = createSQLiteStores();
    await stores.close();

    await expect(stores.users.getById(1)).rejects.toThrow();
  });
});
