export { InMemoryUserRepository } from './in-memory-user-repository.js';
export type { InMemoryUserRepositoryOptions } from './in-memory-user-repository.js';

// Re-export the repository interface from the core package for convenience
export type {
  PageRequest,
  User,
  UserInput,
  UserPage,
  UserRepository,
} from '@callgate/core';
