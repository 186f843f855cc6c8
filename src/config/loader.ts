import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { LogLevel, StorageType, TrafficsmithConfig } from '../types/index.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAMES } from './defaults.js';

const STORAGE_TYPES = ['memory', 'lowdb', 'sqlite'] as const;
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Configuration file structure (YAML format)
 */
export const configFileSchema = z.object({
  server: z.object({ port: z.number().int().optional() }).optional(),
  storage: z
    .object({
      type: z.enum(STORAGE_TYPES).optional(),
      path: z.string().optional(),
    })
    .optional(),
  rules: z
    .object({
      watch: z.boolean().optional(),
      presetsPath: z.string().optional(),
    })
    .optional(),
  model: z
    .object({
      ignoreHeaders: z.array(z.string()).optional(),
      varianceThreshold: z.number().int().optional(),
    })
    .optional(),
  logging: z.object({ level: z.enum(LOG_LEVELS).optional() }).optional(),
  output: z.object({ dir: z.string().optional() }).optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * CLI options that can override config file
 */
export interface CliOptions {
  port?: string;
  storage?: string;
  storageType?: string;
  config?: string;
  watch?: boolean;
  presets?: string;
  logLevel?: string;
  outDir?: string;
}

/**
 * Find config file in current directory or parent directories
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Load and parse a YAML config file
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Config file not found: ${filePath}`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new Error(`Failed to parse config file: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = configFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid config file ${filePath}: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Convert config file structure to TrafficsmithConfig
 */
export function configFileToConfig(file: ConfigFile): Partial<TrafficsmithConfig> {
  const config: Partial<TrafficsmithConfig> = {};

  if (file.server?.port !== undefined) {
    config.port = file.server.port;
  }

  if (file.storage !== undefined) {
    config.storage = {
      type: file.storage.type ?? DEFAULT_CONFIG.storage.type,
      path: file.storage.path ?? DEFAULT_CONFIG.storage.path,
    };
  }

  if (file.rules !== undefined) {
    config.rules = {
      watch: file.rules.watch ?? DEFAULT_CONFIG.rules.watch,
      ...(file.rules.presetsPath !== undefined ? { presetsPath: file.rules.presetsPath } : {}),
    };
  }

  if (file.model !== undefined) {
    config.model = {
      ignoreHeaders: file.model.ignoreHeaders ?? DEFAULT_CONFIG.model.ignoreHeaders,
      varianceThreshold: file.model.varianceThreshold ?? DEFAULT_CONFIG.model.varianceThreshold,
    };
  }

  if (file.logging?.level !== undefined) {
    config.logging = { level: file.logging.level };
  }

  if (file.output?.dir !== undefined) {
    config.output = { dir: file.output.dir };
  }

  return config;
}

/**
 * Convert CLI options to TrafficsmithConfig
 */
export function cliOptionsToConfig(cli: CliOptions, base: TrafficsmithConfig = DEFAULT_CONFIG): Partial<TrafficsmithConfig> {
  const config: Partial<TrafficsmithConfig> = {};

  if (cli.port !== undefined) {
    const port = parseInt(cli.port, 10);
    if (!isNaN(port)) {
      config.port = port;
    }
  }

  if (cli.storage !== undefined || cli.storageType !== undefined) {
    config.storage = {
      type: isStorageType(cli.storageType) ? cli.storageType : inferStorageType(cli.storage, base.storage.type),
      path: cli.storage ?? base.storage.path,
    };
  }

  if (cli.watch !== undefined || cli.presets !== undefined) {
    const presetsPath = cli.presets ?? base.rules.presetsPath;
    config.rules = {
      watch: cli.watch ?? base.rules.watch,
      ...(presetsPath !== undefined ? { presetsPath } : {}),
    };
  }

  if (isLogLevel(cli.logLevel)) {
    config.logging = { level: cli.logLevel };
  }

  if (cli.outDir !== undefined) {
    config.output = { dir: cli.outDir };
  }

  return config;
}

/**
 * Merge config objects (source overrides target)
 */
export function mergeConfig(target: TrafficsmithConfig, source: Partial<TrafficsmithConfig>): TrafficsmithConfig {
  return {
    port: source.port ?? target.port,
    storage: source.storage ? { ...target.storage, ...source.storage } : target.storage,
    rules: source.rules ? { ...target.rules, ...source.rules } : target.rules,
    model: source.model ? { ...target.model, ...source.model } : target.model,
    logging: source.logging ? { ...target.logging, ...source.logging } : target.logging,
    output: source.output ? { ...target.output, ...source.output } : target.output,
  };
}

/**
 * Load configuration from file and CLI options
 * Priority: CLI options > Config file > Defaults
 */
export async function loadConfig(cliOptions: CliOptions = {}): Promise<TrafficsmithConfig> {
  let fileConfig: Partial<TrafficsmithConfig> = {};

  // Load from specified config file or auto-discover
  const configPath = cliOptions.config ?? await findConfigFile();

  if (configPath) {
    try {
      fileConfig = configFileToConfig(await loadConfigFile(configPath));
    } catch (error) {
      // An explicitly named file must load; a discovered one may be skipped
      if (cliOptions.config) {
        throw error;
      }
    }
  }

  const merged = mergeConfig(DEFAULT_CONFIG, fileConfig);
  return mergeConfig(merged, cliOptionsToConfig(cliOptions, merged));
}

/**
 * Validate configuration
 */
export function validateConfig(config: TrafficsmithConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push(`Invalid port: ${config.port}. Must be between 0 and 65535.`);
  }

  if (!isStorageType(config.storage.type)) {
    errors.push(`Invalid storage type: ${config.storage.type}. Must be: memory, lowdb or sqlite.`);
  }

  if (config.storage.type !== 'memory' && !config.storage.path) {
    errors.push(`Storage path is required for ${config.storage.type} storage.`);
  }

  if (!Number.isInteger(config.model.varianceThreshold) || config.model.varianceThreshold < 2) {
    errors.push(`Invalid variance threshold: ${config.model.varianceThreshold}. Must be an integer >= 2.`);
  }

  if (!isLogLevel(config.logging.level)) {
    errors.push(`Invalid log level: ${config.logging.level}.`);
  }

  if (!config.output.dir) {
    errors.push('Output directory must not be empty.');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

function isStorageType(value: string | undefined): value is StorageType {
  return STORAGE_TYPES.some((type) => type === value);
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Pick the backing from the file extension (`.db`/`.sqlite` -> sqlite)
 */
function inferStorageType(path: string | undefined, fallback: StorageType): StorageType {
  if (path === undefined) return fallback;
  if (/\.(db|sqlite3?)$/i.test(path)) return 'sqlite';
  if (/\.json$/i.test(path)) return 'lowdb';
  return fallback;
}
