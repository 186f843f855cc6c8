import { describe, it, expect, beforeEach } from 'vitest';
import { RuleEngine, hostMatches, toAttributes } from '../../src/core/rule-engine.js';
import { RuleStore } from '../../src/core/rule-store.js';
import { loadPresets } from '../../src/core/presets.js';
import { MemoryStorage } from '../../src/storage/memory.adapter.js';
import type { ExchangeAttributes } from '../../src/types/index.js';
import { exchange } from '../helpers/har.js';

const attrs = (overrides: Partial<ExchangeAttributes> = {}): ExchangeAttributes => ({
  method: 'GET',
  host: 'api.example.com',
  url: 'https://api.example.com/users',
  contentType: 'application/json',
  ...overrides,
});

describe('RuleEngine', () => {
  let store: RuleStore;
  let engine: RuleEngine;

  beforeEach(async () => {
    store = new RuleStore({ storage: new MemoryStorage(), presets: await loadPresets() });
    await store.init();
    engine = new RuleEngine(store);
  });

  it('should include everything with no rules', async () => {
    await engine.reload();

    expect(engine.explain(attrs())).toEqual({ included: true, reason: 'included' });
  });

  describe('filter rules', () => {
    it('should exclude on the first matching rule', async () => {
      await store.addFilterRule({ id: 'css', pattern: '\\.css$', type: 'url' });
      await store.addFilterRule({ id: 'any-static', pattern: 'static', type: 'url' });
      await engine.reload();

      const result = engine.explain(attrs({ url: 'https://cdn.example.com/static/app.css' }));

      expect(result).toEqual({ included: false, reason: 'filter-rule', ruleId: 'css' });
    });

    it('should match each rule type against its attribute', async () => {
      await store.addFilterRule({ id: 'html', pattern: '^text/html', type: 'content-type' });
      await store.addFilterRule({ id: 'options', pattern: '^OPTIONS$', type: 'method' });
      await store.addFilterRule({ id: 'tracker', pattern: '^tracking\\.', type: 'host' });
      await engine.reload();

      expect(engine.evaluate(attrs({ contentType: 'text/html; charset=utf-8' }))).toBe(false);
      expect(engine.evaluate(attrs({ method: 'OPTIONS' }))).toBe(false);
      expect(engine.evaluate(attrs({ host: 'tracking.example.com' }))).toBe(false);
      expect(engine.evaluate(attrs())).toBe(true);
    });

    it('should ignore disabled rules', async () => {
      await store.addFilterRule({ id: 'off', pattern: 'users', type: 'url', enabled: false });
      await engine.reload();

      expect(engine.evaluate(attrs())).toBe(true);
    });

    it('should exclude static noise once the common-noise preset is applied', async () => {
      await store.applyPreset('common-noise');
      await engine.reload();

      expect(engine.explain(attrs({ url: 'https://api.example.com/assets/logo.png' }))).toEqual({
        included: false,
        reason: 'filter-rule',
        ruleId: 'noise-static-assets',
      });
      expect(engine.evaluate(attrs({ url: 'https://api.example.com/orders/7' }))).toBe(true);
    });
  });

  describe('host allow-list', () => {
    it('should only keep allowed hosts once a host rule is enabled', async () => {
      await store.addHostRule({ host: 'api.example.com' });
      await engine.reload();

      expect(engine.evaluate(attrs())).toBe(true);
      expect(engine.explain(attrs({ host: 'other.example.com' }))).toEqual({
        included: false,
        reason: 'host-not-allowed',
      });
    });

    it('should match subdomains only when asked to', async () => {
      await store.addHostRule({ host: 'example.com', includeSubdomains: true });
      await engine.reload();

      expect(engine.evaluate(attrs({ host: 'api.example.com' }))).toBe(true);
      expect(engine.evaluate(attrs({ host: 'example.com' }))).toBe(true);
      expect(engine.evaluate(attrs({ host: 'badexample.com' }))).toBe(false);
    });

    it('should not restrict hosts when every host rule is disabled', async () => {
      await store.addHostRule({ host: 'api.example.com', enabled: false });
      await engine.reload();

      expect(engine.evaluate(attrs({ host: 'anything.test' }))).toBe(true);
    });

    it('should apply filter rules before the allow-list', async () => {
      await store.addHostRule({ host: 'api.example.com' });
      await store.addFilterRule({ id: 'health', pattern: '/health$', type: 'url' });
      await engine.reload();

      const result = engine.explain(attrs({ url: 'https://api.example.com/health' }));

      expect(result.reason).toBe('filter-rule');
    });
  });

  describe('hostMatches', () => {
    it('should compare case-insensitively', () => {
      const rule = { id: 'h', host: 'API.example.com', enabled: true, includeSubdomains: false };

      expect(hostMatches(rule, 'api.EXAMPLE.com')).toBe(true);
      expect(hostMatches(rule, 'v2.api.example.com')).toBe(false);
    });
  });

  describe('toAttributes', () => {
    it('should prefer the response content type', () => {
      const decoded = exchange({
        method: 'POST',
        url: 'https://api.example.com/orders?x=1',
        requestHeaders: { 'Content-Type': 'application/x-www-form-urlencoded' },
        responseHeaders: { 'Content-Type': 'application/json' },
      });

      expect(toAttributes(decoded)).toEqual({
        method: 'POST',
        host: 'api.example.com',
        url: 'https://api.example.com/orders?x=1',
        contentType: 'application/json',
      });
    });

    it('should fall back to the request content type', () => {
      const decoded = exchange({
        method: 'POST',
        url: 'https://api.example.com/orders',
        requestHeaders: { 'Content-Type': 'text/plain' },
      });

      expect(toAttributes(decoded).contentType).toBe('text/plain');
    });
  });

  describe('reload', () => {
    it('should not see store changes until reloaded', async () => {
      await engine.reload();
      await store.addFilterRule({ pattern: 'users', type: 'url' });

      expect(engine.evaluate(attrs())).toBe(true);

      await engine.reload();
      expect(engine.evaluate(attrs())).toBe(false);
    });

    it('should bump the version on every reload', async () => {
      const first = await engine.reload();
      const second = await engine.reload();

      expect(first.version).toBe(1);
      expect(second.version).toBe(2);
      expect(engine.current()).toBe(second);
    });

    it('should keep a predicate pinned to the snapshot it was created from', async () => {
      await engine.reload();
      const predicate = engine.createPredicate();
      const decoded = exchange({ url: 'https://api.example.com/users' });

      await store.addFilterRule({ pattern: 'users', type: 'url' });
      await engine.reload();

      expect(predicate(decoded)).toBe(true);
      expect(engine.createPredicate()(decoded)).toBe(false);
    });
  });
});
