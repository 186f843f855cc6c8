import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { FilterRule, FilterRuleType, HostRule, RuleState } from '../types/index.js';
import type { Storage } from './base.js';

/**
 * SQLite-based storage adapter
 * Every write replaces both tables inside one transaction
 */
export class SQLiteStorage implements Storage {
  private db: DatabaseType | null = null;
  private path: string;

  constructor(path: string = './.trafficsmith/rules.db') {
    this.path = resolve(path);
  }

  async init(): Promise<void> {
    const dir = dirname(this.path);
    await mkdir(dir, { recursive: true });

    this.db = new Database(this.path);

    // Enable WAL mode for better concurrent access
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS filter_rules (
        position INTEGER NOT NULL,
        id TEXT PRIMARY KEY,
        pattern TEXT NOT NULL,
        type TEXT NOT NULL,
        enabled INTEGER NOT NULL,
        description TEXT
      );

      CREATE TABLE IF NOT EXISTS host_rules (
        position INTEGER NOT NULL,
        id TEXT PRIMARY KEY,
        host TEXT NOT NULL UNIQUE,
        enabled INTEGER NOT NULL,
        description TEXT,
        include_subdomains INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_filter_position ON filter_rules(position);
      CREATE INDEX IF NOT EXISTS idx_host_position ON host_rules(position);
    `);
  }

  private getDb(): DatabaseType {
    if (!this.db) {
      throw new Error('Storage not initialized. Call init() first.');
    }
    return this.db;
  }

  async read(): Promise<RuleState> {
    const db = this.getDb();

    const filterRows = db
      .prepare('SELECT * FROM filter_rules ORDER BY position ASC')
      .all() as FilterRuleRow[];
    const hostRows = db
      .prepare('SELECT * FROM host_rules ORDER BY position ASC')
      .all() as HostRuleRow[];

    return {
      filterRules: filterRows.map((row) => this.rowToFilterRule(row)),
      hostRules: hostRows.map((row) => this.rowToHostRule(row)),
    };
  }

  async write(state: RuleState): Promise<void> {
    const db = this.getDb();

    const insertFilter = db.prepare(`
      INSERT INTO filter_rules (position, id, pattern, type, enabled, description)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const insertHost = db.prepare(`
      INSERT INTO host_rules (position, id, host, enabled, description, include_subdomains)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    const replaceAll = db.transaction((next: RuleState) => {
      db.exec('DELETE FROM filter_rules; DELETE FROM host_rules;');
      next.filterRules.forEach((rule, position) => {
        insertFilter.run(
          position,
          rule.id,
          rule.pattern,
          rule.type,
          rule.enabled ? 1 : 0,
          rule.description ?? null
        );
      });
      next.hostRules.forEach((rule, position) => {
        insertHost.run(
          position,
          rule.id,
          rule.host,
          rule.enabled ? 1 : 0,
          rule.description ?? null,
          rule.includeSubdomains ? 1 : 0
        );
      });
    });

    replaceAll(state);
  }

  location(): string | null {
    return this.path;
  }

  /**
   * Close the database connection
   */
  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private rowToFilterRule(row: FilterRuleRow): FilterRule {
    const rule: FilterRule = {
      id: row.id,
      pattern: row.pattern,
      type: row.type,
      enabled: row.enabled === 1,
    };
    if (row.description !== null) {
      rule.description = row.description;
    }
    return rule;
  }

  private rowToHostRule(row: HostRuleRow): HostRule {
    const rule: HostRule = {
      id: row.id,
      host: row.host,
      enabled: row.enabled === 1,
      includeSubdomains: row.include_subdomains === 1,
    };
    if (row.description !== null) {
      rule.description = row.description;
    }
    return rule;
  }
}

interface FilterRuleRow {
  position: number;
  id: string;
  pattern: string;
  type: FilterRuleType;
  enabled: number;
  description: string | null;
}

interface HostRuleRow {
  position: number;
  id: string;
  host: string;
  enabled: number;
  description: string | null;
  include_subdomains: number;
}
