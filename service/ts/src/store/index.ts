import type { ProfileStore } from './types.js';
import { MemoryStore } from './memory.js';
import { PostgresStore } from './postgres.js';

export * from './types.js';

let store: ProfileStore | null = null;

export const getStore = (): ProfileStore => {
  if (!store) {
    store = process.env.DATABASE_URL ? new PostgresStore() : new MemoryStore();
  }
  return store;
};
