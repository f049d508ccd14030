export { SQLiteUserRepository } from './sqlite-user-repository.js';
export type { SQLiteUserRepositoryOptions } from './sqlite-user-repository.js';
export { createSQLiteStores } from './create-stores.js';
export type {
  CreateSQLiteStoresOptions,
  SQLiteStores,
} from './create-stores.js';
export * from './schema.js';

// Re-export the repository interface from the core package for convenience
export type {
  PageRequest,
  User,
  UserInput,
  UserPage,
  UserRepository,
} from '@callgate/core';
