import type { StorageConfig } from '../types/index.js';
import type { Storage } from './base.js';
import { MemoryStorage } from './memory.adapter.js';
import { LowDBStorage } from './lowdb.adapter.js';
import { SQLiteStorage } from './sqlite.adapter.js';

/**
 * Create storage adapter based on config
 */
export function createStorage(config: StorageConfig): Storage {
  const { type, path } = config;

  if (type === 'memory') {
    return new MemoryStorage();
  }

  if (type === 'lowdb') {
    return new LowDBStorage(path);
  }

  if (type === 'sqlite') {
    return new SQLiteStorage(path);
  }

  throw new Error(`Unsupported storage type: ${String(type)}`);
}
