import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm } from 'node:fs/promises';
import { TrafficsmithServer } from '../../src/index.js';
import { silentLogger } from '../../src/core/logger.js';
import type { FilterRule, HostRule, PresetSummary } from '../../src/types/index.js';

const TEST_PORT = 4101;
const TEST_DB_PATH = './test-control/rules.json';
const BASE = `http://localhost:${TEST_PORT}`;

interface ErrorResponse {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

const send = (method: string, path: string, body?: unknown) =>
  fetch(`${BASE}${path}`, {
    method,
    headers: { 'Content-Type': 'application/json' },
    ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
  });

describe('Integration: Control API', () => {
  let server: TrafficsmithServer;

  beforeEach(async () => {
    server = new TrafficsmithServer(
      { port: TEST_PORT, storage: { type: 'lowdb', path: TEST_DB_PATH } },
      {},
      silentLogger
    );
    await server.start();
  });

  afterEach(async () => {
    if (server.running()) {
      await server.stop();
    }
    await rm('./test-control', { recursive: true, force: true });
  });

  describe('/__health', () => {
    it('should return health status', async () => {
      const res = await fetch(`${BASE}/__health`);
      const data: { status: string; uptime: number; rulesVersion: number } = await res.json();

      expect(res.status).toBe(200);
      expect(data.status).toBe('ok');
      expect(typeof data.uptime).toBe('number');
      expect(data.rulesVersion).toBe(1);
    });
  });

  describe('/filters', () => {
    it('should create, read, update and delete a filter rule', async () => {
      const created = await send('POST', '/filters', { id: 'css', pattern: '\\.css$', type: 'url' });
      expect(created.status).toBe(201);
      expect(await created.json()).toEqual({ id: 'css', pattern: '\\.css$', type: 'url', enabled: true });

      const fetched: FilterRule = await (await fetch(`${BASE}/filters/css`)).json();
      expect(fetched.pattern).toBe('\\.css$');

      const updated: FilterRule = await (await send('PUT', '/filters/css', { pattern: '\\.(css|js)$' })).json();
      expect(updated.pattern).toBe('\\.(css|js)$');

      const removed = await send('DELETE', '/filters/css');
      expect(removed.status).toBe(200);

      const list: FilterRule[] = await (await fetch(`${BASE}/filters`)).json();
      expect(list).toEqual([]);
    });

    it('should reject an invalid pattern with 400 and keep the list unchanged', async () => {
      await send('POST', '/filters', { id: 'keep', pattern: 'static', type: 'url' });

      const res = await send('POST', '/filters', { pattern: '(.example\\.com', type: 'host' });
      const data: ErrorResponse = await res.json();

      expect(res.status).toBe(400);
      expect(data.error.code).toBe('INVALID_PATTERN');
      expect(data.error.details).toEqual({ pattern: '(.example\\.com' });

      const list: FilterRule[] = await (await fetch(`${BASE}/filters`)).json();
      expect(list.map((r) => r.id)).toEqual(['keep']);
    });

    it('should return 404 for an unknown rule', async () => {
      const res = await send('DELETE', '/filters/missing');
      const data: ErrorResponse = await res.json();

      expect(res.status).toBe(404);
      expect(data.error).toEqual({
        code: 'NOT_FOUND',
        message: 'Unknown filter rule: missing',
        details: { kind: 'filter rule', id: 'missing' },
      });
    });

    it('should reject a body that is not valid JSON', async () => {
      const res = await fetch(`${BASE}/filters`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{ nope',
      });
      const data: ErrorResponse = await res.json();

      expect(res.status).toBe(400);
      expect(data.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' });
    });

    it('should flip a rule when toggled without a body', async () => {
      await send('POST', '/filters', { id: 'css', pattern: '\\.css$', type: 'url' });

      const first: FilterRule = await (await send('PATCH', '/filters/css/toggle')).json();
      const second: FilterRule = await (await send('PATCH', '/filters/css/toggle', { enabled: true })).json();

      expect(first.enabled).toBe(false);
      expect(second.enabled).toBe(true);
    });

    it('should reload the engine after every mutation', async () => {
      await send('POST', '/filters', { pattern: '\\.css$', type: 'url' });

      const engine = server.getEngine();
      expect(engine.current().version).toBe(2);
      expect(
        engine.evaluate({ method: 'GET', host: 'a.test', url: 'https://a.test/app.css', contentType: 'text/css' })
      ).toBe(false);
    });
  });

  describe('/filters/hosts', () => {
    it('should manage host rules', async () => {
      const created = await send('POST', '/filters/hosts', { id: 'api', host: 'api.example.com' });
      expect(created.status).toBe(201);

      const duplicate = await send('POST', '/filters/hosts', { host: 'API.example.com' });
      const duplicateBody: ErrorResponse = await duplicate.json();
      expect(duplicate.status).toBe(400);
      expect(duplicateBody.error.message).toBe('Host already exists: API.example.com');

      const toggled: HostRule = await (await send('PATCH', '/filters/hosts/api/toggle', { enabled: false })).json();
      expect(toggled.enabled).toBe(false);

      const updated: HostRule = await (await send('PUT', '/filters/hosts/api', { includeSubdomains: true })).json();
      expect(updated.includeSubdomains).toBe(true);

      const list: HostRule[] = await (await fetch(`${BASE}/filters/hosts`)).json();
      expect(list).toEqual([{ id: 'api', host: 'api.example.com', enabled: false, includeSubdomains: true }]);

      expect((await send('DELETE', '/filters/hosts/api')).status).toBe(200);
      expect((await fetch(`${BASE}/filters/hosts/api`)).status).toBe(404);
    });
  });

  describe('/filters/presets', () => {
    it('should list presets', async () => {
      const presets: PresetSummary[] = await (await fetch(`${BASE}/filters/presets`)).json();

      expect(presets[0]).toEqual({
        id: 'common-noise',
        name: 'Common noise',
        description: 'Static assets, analytics hosts and HTML pages',
        ruleCount: 3,
      });
    });

    it('should apply a preset over colliding rules', async () => {
      await send('POST', '/filters', { id: 'noise-static-assets', pattern: 'old', type: 'url' });
      await send('POST', '/filters', { id: 'noise-html-pages', pattern: 'old', type: 'content-type' });

      const res = await send('POST', '/filters/presets/common-noise/apply');
      const data: { applied: FilterRule[]; filterRules: FilterRule[] } = await res.json();

      expect(res.status).toBe(200);
      expect(data.applied).toHaveLength(3);
      expect(data.filterRules.map((r) => r.id)).toEqual([
        'noise-static-assets',
        'noise-html-pages',
        'noise-analytics-hosts',
      ]);
    });

    it('should return 404 for an unknown preset', async () => {
      const res = await send('POST', '/filters/presets/nope/apply');

      expect(res.status).toBe(404);
    });
  });

  describe('/rules/reload', () => {
    it('should re-read storage and publish a new snapshot', async () => {
      await server.getStore().getStorage().write({
        filterRules: [{ id: 'ext', pattern: 'x', type: 'url', enabled: true }],
        hostRules: [{ id: 'h', host: 'api.example.com', enabled: true, includeSubdomains: false }],
      });

      const res = await send('POST', '/rules/reload');
      const data: { version: number; loadedAt: number; filterRules: number; hostRules: number } = await res.json();

      expect(res.status).toBe(200);
      expect(data.version).toBe(2);
      expect(data.filterRules).toBe(1);
      expect(data.hostRules).toBe(1);
      expect(typeof data.loadedAt).toBe('number');
    });
  });

  describe('unknown routes', () => {
    it('should return a 404 error body', async () => {
      const res = await fetch(`${BASE}/nowhere`);
      const data: ErrorResponse = await res.json();

      expect(res.status).toBe(404);
      expect(data.error).toEqual({ code: 'NOT_FOUND', message: 'No route for GET /nowhere' });
    });
  });
});
