import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, rm, mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  cliOptionsToConfig,
  loadConfig,
  loadConfigFile,
  findConfigFile,
  mergeConfig,
  validateConfig,
  DEFAULT_CONFIG,
} from '../../src/config/index.js';

const TEST_DIR = './test-config';

describe('Config Loader', () => {
  beforeEach(async () => {
    await mkdir(TEST_DIR, { recursive: true });
  });

  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('DEFAULT_CONFIG', () => {
    it('should have sensible defaults', () => {
      expect(DEFAULT_CONFIG.port).toBe(3001);
      expect(DEFAULT_CONFIG.storage).toEqual({ type: 'lowdb', path: './.trafficsmith/rules.json' });
      expect(DEFAULT_CONFIG.rules.watch).toBe(false);
      expect(DEFAULT_CONFIG.model.varianceThreshold).toBe(5);
      expect(DEFAULT_CONFIG.model.ignoreHeaders).toContain('cookie');
      expect(DEFAULT_CONFIG.logging.level).toBe('info');
    });
  });

  describe('loadConfigFile', () => {
    it('should load valid YAML config', async () => {
      const configPath = `${TEST_DIR}/trafficsmith.config.yml`;
      await writeFile(
        configPath,
        `
server:
  port: 4000
storage:
  type: sqlite
  path: ./custom/rules.db
rules:
  watch: true
  presetsPath: ./presets.json
model:
  ignoreHeaders:
    - x-trace
  varianceThreshold: 3
logging:
  level: debug
output:
  dir: ./generated
`
      );

      const config = await loadConfigFile(configPath);

      expect(config).toEqual({
        server: { port: 4000 },
        storage: { type: 'sqlite', path: './custom/rules.db' },
        rules: { watch: true, presetsPath: './presets.json' },
        model: { ignoreHeaders: ['x-trace'], varianceThreshold: 3 },
        logging: { level: 'debug' },
        output: { dir: './generated' },
      });
    });

    it('should treat an empty file as no settings', async () => {
      const configPath = `${TEST_DIR}/empty.yml`;
      await writeFile(configPath, '');

      expect(await loadConfigFile(configPath)).toEqual({});
    });

    it('should throw on a missing file', async () => {
      await expect(loadConfigFile(`${TEST_DIR}/missing.yml`)).rejects.toThrow(
        `Config file not found: ${TEST_DIR}/missing.yml`
      );
    });

    it('should throw on invalid YAML', async () => {
      const configPath = `${TEST_DIR}/invalid.yml`;
      await writeFile(configPath, 'server: [port: 4000');

      await expect(loadConfigFile(configPath)).rejects.toThrow('Failed to parse config file');
    });

    it('should throw on values of the wrong shape', async () => {
      const configPath = `${TEST_DIR}/wrong.yml`;
      await writeFile(configPath, 'storage:\n  type: redis\n');

      await expect(loadConfigFile(configPath)).rejects.toThrow(`Invalid config file ${configPath}: storage.type`);
    });
  });

  describe('findConfigFile', () => {
    it('should find the config in a parent directory', async () => {
      const nested = `${TEST_DIR}/a/b`;
      await mkdir(nested, { recursive: true });
      await writeFile(`${TEST_DIR}/trafficsmith.yml`, 'server:\n  port: 5000\n');

      expect(await findConfigFile(nested)).toBe(resolve(TEST_DIR, 'trafficsmith.yml'));
    });
  });

  describe('loadConfig', () => {
    it('should layer CLI options over the file over defaults', async () => {
      const configPath = `${TEST_DIR}/trafficsmith.config.yml`;
      await writeFile(configPath, 'server:\n  port: 4000\nlogging:\n  level: warn\n');

      const config = await loadConfig({ config: configPath, port: '4500', outDir: './out' });

      expect(config.port).toBe(4500);
      expect(config.logging.level).toBe('warn');
      expect(config.output.dir).toBe('./out');
      expect(config.storage).toEqual(DEFAULT_CONFIG.storage);
    });

    it('should fail when an explicitly named file is invalid', async () => {
      const configPath = `${TEST_DIR}/bad.yml`;
      await writeFile(configPath, 'server:\n  port: nope\n');

      await expect(loadConfig({ config: configPath })).rejects.toThrow('Invalid config file');
    });
  });

  describe('cliOptionsToConfig', () => {
    it('should infer the storage type from the file extension', () => {
      expect(cliOptionsToConfig({ storage: './rules.db' }).storage).toEqual({ type: 'sqlite', path: './rules.db' });
      expect(cliOptionsToConfig({ storage: './rules.json' }).storage).toEqual({ type: 'lowdb', path: './rules.json' });
      expect(cliOptionsToConfig({ storage: './rules.db', storageType: 'memory' }).storage?.type).toBe('memory');
    });

    it('should ignore a port that is not a number and an unknown log level', () => {
      expect(cliOptionsToConfig({ port: 'abc', logLevel: 'loud' })).toEqual({});
    });

    it('should carry the presets path and watch flag', () => {
      expect(cliOptionsToConfig({ watch: true, presets: './p.json' }).rules).toEqual({
        watch: true,
        presetsPath: './p.json',
      });
    });
  });

  describe('mergeConfig', () => {
    it('should override only the given sections', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, { port: 9000, model: { ignoreHeaders: [], varianceThreshold: 3 } });

      expect(merged.port).toBe(9000);
      expect(merged.model).toEqual({ ignoreHeaders: [], varianceThreshold: 3 });
      expect(merged.storage).toBe(DEFAULT_CONFIG.storage);
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
    });

    it('should report every invalid setting', () => {
      const result = validateConfig({
        ...DEFAULT_CONFIG,
        port: 70000,
        storage: { type: 'lowdb', path: '' },
        model: { ignoreHeaders: [], varianceThreshold: 1 },
        output: { dir: '' },
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'Invalid port: 70000. Must be between 0 and 65535.',
        'Storage path is required for lowdb storage.',
        'Invalid variance threshold: 1. Must be an integer >= 2.',
        'Output directory must not be empty.',
      ]);
    });

    it('should allow memory storage without a path', () => {
      expect(validateConfig({ ...DEFAULT_CONFIG, storage: { type: 'memory', path: '' } }).valid).toBe(true);
    });
  });
});
