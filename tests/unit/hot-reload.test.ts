import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm, writeFile } from 'node:fs/promises';
import { createHotReload, type HotReloadService } from '../../src/config/hot-reload.js';
import { RuleEngine } from '../../src/core/rule-engine.js';
import { RuleStore } from '../../src/core/rule-store.js';
import { LowDBStorage } from '../../src/storage/lowdb.adapter.js';
import { MemoryStorage } from '../../src/storage/memory.adapter.js';

const TEST_DIR = './test-hot-reload';
const RULES_FILE = `${TEST_DIR}/rules.json`;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('createHotReload', () => {
  it('should return null for a store without a file', async () => {
    const store = new RuleStore({ storage: new MemoryStorage() });
    await store.init();

    expect(createHotReload({ store, engine: new RuleEngine(store) })).toBeNull();
  });

  describe('with a rules file', () => {
    let store: RuleStore;
    let engine: RuleEngine;
    let service: HotReloadService | null = null;

    beforeEach(async () => {
      store = new RuleStore({ storage: new LowDBStorage(RULES_FILE) });
      await store.init();
      await store.addFilterRule({ id: 'css', pattern: '\\.css$', type: 'url' });
      engine = new RuleEngine(store);
      await engine.reload();
    });

    afterEach(async () => {
      await service?.stop();
      service = null;
      await store.close();
      await rm(TEST_DIR, { recursive: true, force: true });
    });

    it('should reload the engine after the file is edited elsewhere', async () => {
      const versions: number[] = [];
      const reloaded = new Promise<void>((resolve) => {
        service = createHotReload({
          store,
          engine,
          debounceMs: 50,
          onReload: (version) => {
            versions.push(version);
            resolve();
          },
        });
      });
      expect(service).not.toBeNull();
      service?.start();
      await sleep(300);

      await writeFile(
        RULES_FILE,
        JSON.stringify({
          filterRules: [{ id: 'health', pattern: '/health$', type: 'url', enabled: true }],
          hostRules: [],
        })
      );
      await reloaded;

      expect(versions).toEqual([2]);
      expect(store.listFilterRules().map((r) => r.id)).toEqual(['health']);
      expect(engine.explain({ method: 'GET', host: 'a.test', url: 'https://a.test/health', contentType: '' })).toEqual({
        included: false,
        reason: 'filter-rule',
        ruleId: 'health',
      });
      expect(service?.getStats().reloadCount).toBe(1);
    });

    it('should keep the previous rules when the edited file is invalid', async () => {
      const failed = new Promise<Error>((resolve) => {
        service = createHotReload({ store, engine, debounceMs: 50, onError: resolve });
      });
      service?.start();
      await sleep(300);

      await writeFile(
        RULES_FILE,
        JSON.stringify({ filterRules: [{ id: 'bad', pattern: '(', type: 'url', enabled: true }], hostRules: [] })
      );
      const error = await failed;

      expect(error.message).toContain('Invalid pattern "("');
      expect(store.listFilterRules().map((r) => r.id)).toEqual(['css']);
      expect(engine.current().version).toBe(1);
      expect(service?.getStats().lastError).toBe(error);
    });

    it('should report watching state', async () => {
      service = createHotReload({ store, engine });
      expect(service?.isWatching()).toBe(false);

      service?.start();
      expect(service?.isWatching()).toBe(true);
      expect(service?.getStats().watchedPaths).toEqual([store.getStorage().location()]);

      await service?.stop();
      expect(service?.isWatching()).toBe(false);
    });
  });
});
