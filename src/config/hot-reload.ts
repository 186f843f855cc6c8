/**
 * Hot Reload - Watch rule and preset files and reload the engine on changes
 */

import { watch, type FSWatcher } from 'chokidar';
import { resolve } from 'node:path';
import type { RuleEngine } from '../core/rule-engine.js';
import type { RuleStore } from '../core/rule-store.js';
import { loadPresets } from '../core/presets.js';

export interface HotReloadConfig {
  /** File paths to watch */
  paths: string[];
  /** Debounce delay in milliseconds */
  debounceMs?: number;
  /** Called once per debounced batch with the paths that changed */
  onReload: (changed: string[]) => Promise<void>;
  /** Callback when reload fails */
  onError?: (error: Error) => void;
  /** Callback when file changes are detected */
  onChange?: (path: string) => void;
}

export interface HotReloadStats {
  watching: boolean;
  reloadCount: number;
  lastReloadAt: number | null;
  lastError: Error | null;
  watchedPaths: string[];
}

/**
 * Hot reload service for watching rule files
 */
export class HotReloadService {
  private watcher: FSWatcher | null = null;
  private config: HotReloadConfig;
  private debounceMs: number;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private pending = new Set<string>();
  private inFlight: Promise<void> = Promise.resolve();
  private stats: HotReloadStats = {
    watching: false,
    reloadCount: 0,
    lastReloadAt: null,
    lastError: null,
    watchedPaths: [],
  };

  constructor(config: HotReloadConfig) {
    this.config = config;
    this.debounceMs = config.debounceMs ?? 300;
  }

  /**
   * Start watching files
   */
  start(): void {
    if (this.watcher) {
      return;
    }

    this.watcher = watch(this.config.paths, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 50,
      },
    });

    this.watcher.on('change', (path) => this.handleChange(path));
    this.watcher.on('add', (path) => this.handleChange(path));
    this.watcher.on('error', (error) => this.handleError(error instanceof Error ? error : new Error(String(error))));

    this.stats.watching = true;
    this.stats.watchedPaths = [...this.config.paths];
  }

  /**
   * Stop watching and wait for a running reload to settle
   */
  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }

    await this.inFlight;
    this.stats.watching = false;
  }

  /**
   * Handle file change event
   */
  private handleChange(path: string): void {
    this.config.onChange?.(path);
    this.pending.add(path);

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.inFlight = this.inFlight.then(() => this.reload());
    }, this.debounceMs);
  }

  /**
   * Run the reload callback for the batched changes. Never rejects.
   */
  private async reload(): Promise<void> {
    const changed = Array.from(this.pending);
    this.pending.clear();

    try {
      await this.config.onReload(changed);
      this.stats.reloadCount++;
      this.stats.lastReloadAt = Date.now();
      this.stats.lastError = null;
    } catch (error) {
      this.handleError(error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Handle errors
   */
  private handleError(error: Error): void {
    this.stats.lastError = error;
    this.config.onError?.(error);
  }

  /**
   * Get current stats
   */
  getStats(): HotReloadStats {
    return { ...this.stats };
  }

  /**
   * Check if watching
   */
  isWatching(): boolean {
    return this.stats.watching;
  }
}

export interface RuleHotReloadOptions {
  store: RuleStore;
  engine: RuleEngine;
  /** Preset bundle file to reload when it changes */
  presetsPath?: string;
  debounceMs?: number;
  onReload?: (version: number) => void;
  onError?: (error: Error) => void;
  onChange?: (path: string) => void;
}

/**
 * Watch the store's backing file (and the preset file) and reload the engine
 * after external edits. Returns null when there is nothing on disk to watch.
 */
export function createHotReload(options: RuleHotReloadOptions): HotReloadService | null {
  const location = options.store.getStorage().location();
  if (!location && !options.presetsPath) {
    return null;
  }

  const presetsPath = options.presetsPath ? resolve(options.presetsPath) : null;
  const paths: string[] = [];
  if (location) {
    paths.push(location);
    if (/\.(db|sqlite3?)$/i.test(location)) {
      paths.push(`${location}-wal`);
    }
  }
  if (presetsPath) {
    paths.push(presetsPath);
  }

  return new HotReloadService({
    paths,
    debounceMs: options.debounceMs,
    onChange: options.onChange,
    onError: options.onError,
    onReload: async (changed) => {
      if (presetsPath && changed.some((path) => resolve(path) === presetsPath)) {
        options.store.setPresets(await loadPresets(presetsPath));
      }
      if (location && changed.some((path) => resolve(path) !== presetsPath)) {
        await options.store.refresh();
      }
      const snapshot = await options.engine.reload();
      options.onReload?.(snapshot.version);
    },
  });
}
