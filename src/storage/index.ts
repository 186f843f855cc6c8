export { type Storage, generateId, emptyState, cloneState } from './base.js';
export { MemoryStorage } from './memory.adapter.js';
export { LowDBStorage } from './lowdb.adapter.js';
export { SQLiteStorage } from './sqlite.adapter.js';
export { createStorage } from './factory.js';
