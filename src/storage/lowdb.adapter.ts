import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { RuleState } from '../types/index.js';
import { type Storage, cloneState, emptyState } from './base.js';

/**
 * JSON file storage. The whole rule state is one document, so each write
 * replaces it in a single file write.
 */
export class LowDBStorage implements Storage {
  private db: Low<RuleState> | null = null;
  private path: string;

  constructor(path: string = './.trafficsmith/rules.json') {
    // Use absolute path to avoid issues with temp file paths
    this.path = resolve(path);
  }

  async init(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });

    const adapter = new JSONFile<RuleState>(this.path);
    this.db = new Low<RuleState>(adapter, emptyState());

    await this.db.read();
    if (!Array.isArray(this.db.data.filterRules)) this.db.data.filterRules = [];
    if (!Array.isArray(this.db.data.hostRules)) this.db.data.hostRules = [];
  }

  private getDb(): Low<RuleState> {
    if (!this.db) {
      throw new Error('Storage not initialized. Call init() first.');
    }
    return this.db;
  }

  async read(): Promise<RuleState> {
    const db = this.getDb();
    // Pick up edits made to the file by other processes
    await db.read();
    return cloneState(db.data);
  }

  async write(state: RuleState): Promise<void> {
    const db = this.getDb();
    db.data = cloneState(state);
    await db.write();
  }

  location(): string | null {
    return this.path;
  }

  async close(): Promise<void> {
    this.db = null;
  }
}
