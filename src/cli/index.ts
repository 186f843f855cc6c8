#!/usr/bin/env node

import { readFile, writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import type { FilterRule, HostRule, TrafficsmithConfig } from '../types/index.js';
import { TrafficsmithServer } from '../core/server.js';
import { RuleStore } from '../core/rule-store.js';
import { RuleEngine } from '../core/rule-engine.js';
import { Pipeline, type CatalogueResult } from '../core/pipeline.js';
import { DEFAULT_PRESETS_PATH, loadPresets } from '../core/presets.js';
import { createLogger } from '../core/logger.js';
import { ModelBuilder } from '../generators/model-builder.js';
import { createStorage } from '../storage/factory.js';
import {
  catalogueSchema,
  filterRuleInputSchema,
  hostRuleInputSchema,
  parseOrThrow,
} from '../core/validation.js';
import {
  createHotReload,
  findConfigFile,
  loadConfig,
  validateConfig,
  type CliOptions,
} from '../config/index.js';

const program = new Command();

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function logInfo(label: string, value: string): void {
  console.log(`  ${colors.dim}${label}:${colors.reset} ${colors.cyan}${value}${colors.reset}`);
}

function fail(error: unknown): never {
  log(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`, 'red');
  process.exit(1);
}

interface StoreOptions {
  config?: string;
  storage?: string;
  storageType?: string;
  presets?: string;
}

/**
 * Load config, open the rule store, run the task and close the store
 */
async function withStore<T>(
  options: StoreOptions,
  task: (store: RuleStore, config: TrafficsmithConfig) => Promise<T>
): Promise<T> {
  const config = await loadConfiguration(options);
  const logger = createLogger(config.logging.level, 'stderr');
  const store = new RuleStore({
    storage: createStorage(config.storage),
    presets: await loadPresets(config.rules.presetsPath ?? DEFAULT_PRESETS_PATH),
    logger,
  });

  await store.init();
  try {
    return await task(store, config);
  } finally {
    await store.close();
  }
}

async function loadConfiguration(options: CliOptions): Promise<TrafficsmithConfig> {
  const config = await loadConfig(options);
  const validation = validateConfig(config);
  if (!validation.valid) {
    for (const error of validation.errors) {
      log(`Error: ${error}`, 'red');
    }
    process.exit(1);
  }
  return config;
}

function printFilterRules(rules: FilterRule[]): void {
  if (rules.length === 0) {
    log('  No filter rules.', 'dim');
    return;
  }

  console.log(
    `  ${colors.dim}${'ID'.padEnd(26)} ${'TYPE'.padEnd(13)} ${'ENABLED'.padEnd(8)} PATTERN${colors.reset}`
  );
  console.log(`  ${colors.dim}${'-'.repeat(80)}${colors.reset}`);
  for (const rule of rules) {
    const state = rule.enabled ? `${colors.green}yes${colors.reset}     ` : `${colors.red}no${colors.reset}      `;
    console.log(
      `  ${colors.dim}${rule.id.padEnd(26)}${colors.reset} ${colors.magenta}${rule.type.padEnd(13)}${colors.reset} ${state} ${rule.pattern}`
    );
  }
}

function printHostRules(rules: HostRule[]): void {
  if (rules.length === 0) {
    log('  No host rules. All hosts are allowed.', 'dim');
    return;
  }

  console.log(
    `  ${colors.dim}${'ID'.padEnd(26)} ${'ENABLED'.padEnd(8)} ${'SUBDOMAINS'.padEnd(11)} HOST${colors.reset}`
  );
  console.log(`  ${colors.dim}${'-'.repeat(70)}${colors.reset}`);
  for (const rule of rules) {
    const state = rule.enabled ? `${colors.green}yes${colors.reset}     ` : `${colors.red}no${colors.reset}      `;
    console.log(
      `  ${colors.dim}${rule.id.padEnd(26)}${colors.reset} ${state} ${(rule.includeSubdomains ? 'yes' : 'no').padEnd(11)} ${colors.cyan}${rule.host}${colors.reset}`
    );
  }
}

function printCatalogue(result: CatalogueResult): void {
  console.log('');
  log('  Catalogue', 'bright');
  console.log('');
  logInfo('Entries', String(result.stats.entries));
  logInfo('Included', String(result.stats.included));
  logInfo('Excluded', String(result.stats.excluded));
  logInfo('Skipped', String(result.stats.skipped));
  logInfo('Endpoints', String(result.definitions.length));
  console.log('');

  for (const definition of result.definitions) {
    const status = definition.response.statusCode;
    const statusColor = status >= 400 ? colors.red : colors.green;
    console.log(
      `  ${colors.magenta}${definition.method.padEnd(7)}${colors.reset} ${definition.pathTemplate.padEnd(40)} ${statusColor}${status}${colors.reset} ${colors.dim}x${definition.sampleCount}${colors.reset}`
    );
  }

  const hosts = Object.entries(result.stats.hostStats);
  if (hosts.length > 0) {
    console.log('');
    log('  Hosts', 'bright');
    for (const [host, stats] of hosts) {
      const methods = Object.entries(stats.methods).map(([m, n]) => `${m} ${n}`).join(', ');
      logInfo(host, `${stats.count} (${methods})`);
    }
  }

  if (result.diagnostics.length > 0) {
    console.log('');
    log(`  ${result.diagnostics.length} warning(s)`, 'yellow');
    for (const diagnostic of result.diagnostics) {
      const where = diagnostic.kind === 'PartialParseWarning'
        ? `entry ${diagnostic.entryIndex}`
        : `${diagnostic.definition} ${diagnostic.location}`;
      log(`  ${diagnostic.kind} ${where}: ${diagnostic.message}`, 'yellow');
    }
  }
  console.log('');
}

program
  .name('trafficsmith')
  .description('Filter captured HTTP traffic into API definitions, test cases and docs')
  .version('0.1.0');

// ============================================================================
// SERVE COMMAND
// ============================================================================
interface ServeOptions extends StoreOptions {
  port?: string;
  watch?: boolean;
  logLevel?: string;
}

program
  .command('serve')
  .description('Start the control API')
  .option('-p, --port <port>', 'Server port')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('--storage-type <type>', 'Rule storage backing (memory|lowdb|sqlite)')
  .option('-c, --config <path>', 'Config file path')
  .option('--presets <path>', 'Preset bundle file')
  .option('-w, --watch', 'Reload rules when the storage or preset file changes')
  .option('--log-level <level>', 'Log level')
  .action(async (options: ServeOptions) => {
    try {
      const config = await loadConfiguration(options);
      const configFile = options.config ?? await findConfigFile();
      const logger = createLogger(config.logging.level);

      console.log('');
      log('  trafficsmith', 'bright');
      console.log('');

      const server = new TrafficsmithServer(config, {}, logger);
      await server.start();

      const hotReload = config.rules.watch
        ? createHotReload({
            store: server.getStore(),
            engine: server.getEngine(),
            presetsPath: config.rules.presetsPath,
            onReload: (version) => log(`  Rules reloaded (version ${version})`, 'cyan'),
            onError: (error) => log(`  Reload failed: ${error.message}`, 'red'),
          })
        : null;
      hotReload?.start();

      console.log(`  ${colors.green}Server started${colors.reset}`);
      console.log('');
      if (configFile) {
        logInfo('Config', configFile);
      }
      logInfo('Port', String(config.port));
      logInfo('Storage', `${config.storage.type} ${config.storage.type === 'memory' ? '' : config.storage.path}`);
      logInfo('Presets', config.rules.presetsPath ?? 'built-in');
      logInfo('Watch', hotReload?.isWatching() ? 'enabled' : 'disabled');
      console.log('');
      log(`  Listening on http://localhost:${config.port}`, 'green');
      console.log('');
      logInfo('Health', `http://localhost:${config.port}/__health`);
      logInfo('Filters', `http://localhost:${config.port}/filters`);
      logInfo('Hosts', `http://localhost:${config.port}/filters/hosts`);
      console.log('');
      log('  Press Ctrl+C to stop', 'dim');
      console.log('');

      const shutdown = async (): Promise<void> => {
        console.log('');
        log('  Shutting down...', 'yellow');
        await hotReload?.stop();
        await server.stop();
        log('  Server stopped', 'green');
        process.exit(0);
      };

      process.on('SIGINT', () => {
        shutdown().catch(fail);
      });
      process.on('SIGTERM', () => {
        shutdown().catch(fail);
      });
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// PARSE COMMAND
// ============================================================================
interface ParseOptions extends StoreOptions {
  output?: string;
  outDir?: string;
  json?: boolean;
}

program
  .command('parse <har>')
  .description('Build an API catalogue from a HAR capture')
  .option('-o, --output <path>', 'Write the catalogue JSON to a file')
  .option('--out-dir <dir>', 'Publish catalogue, test cases and docs into a directory')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('--storage-type <type>', 'Rule storage backing (memory|lowdb|sqlite)')
  .option('-c, --config <path>', 'Config file path')
  .option('--json', 'Print the full result as JSON')
  .action(async (har: string, options: ParseOptions) => {
    try {
      await withStore(options, async (store, config) => {
        const logger = createLogger(config.logging.level, 'stderr');
        const engine = new RuleEngine(store, logger);
        await engine.reload();

        const pipeline = new Pipeline({
          engine,
          builder: new ModelBuilder({ ...config.model, logger }),
          logger,
        });

        const controller = new AbortController();
        const cancel = (): void => controller.abort();
        process.once('SIGINT', cancel);

        try {
          const result = await pipeline.parseCapture(har, { signal: controller.signal });

          if (options.output) {
            await writeFile(options.output, `${JSON.stringify(result.definitions, null, 2)}\n`, 'utf-8');
          }

          if (options.outDir) {
            const generated = pipeline.generateTests(result.definitions, { signal: controller.signal });
            await pipeline.publish(options.outDir, { definitions: result.definitions, ...generated }, {
              signal: controller.signal,
            });
          }

          if (options.json) {
            console.log(JSON.stringify(result, null, 2));
            return;
          }

          printCatalogue(result);
          if (options.output) logInfo('Catalogue', options.output);
          if (options.outDir) logInfo('Published', options.outDir);
          if (options.output || options.outDir) console.log('');
        } finally {
          process.removeListener('SIGINT', cancel);
        }
      });
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// GENERATE COMMAND
// ============================================================================
interface GenerateOptions {
  outDir?: string;
  config?: string;
}

program
  .command('generate <catalogue>')
  .description('Generate test cases and docs from a catalogue JSON file')
  .option('--out-dir <dir>', 'Output directory')
  .option('-c, --config <path>', 'Config file path')
  .action(async (cataloguePath: string, options: GenerateOptions) => {
    try {
      const config = await loadConfiguration({ config: options.config, outDir: options.outDir });
      const content = await readFile(cataloguePath, 'utf-8');
      const definitions = parseOrThrow(catalogueSchema, JSON.parse(content), 'catalogue');

      const store = new RuleStore({ storage: createStorage({ type: 'memory', path: '' }) });
      const pipeline = new Pipeline({ engine: new RuleEngine(store) });
      const generated = pipeline.generateTests(definitions);
      const written = await pipeline.publish(config.output.dir, generated);

      log(`Generated ${generated.testCases.length} test case(s)`, 'green');
      for (const file of written) {
        logInfo('Wrote', file);
      }
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        log(`Error: File not found: ${cataloguePath}`, 'red');
        process.exit(1);
      }
      fail(error);
    }
  });

// ============================================================================
// RULES COMMANDS
// ============================================================================
const rules = program.command('rules').description('Manage filter rules');

interface RuleAddOptions extends StoreOptions {
  type: string;
  id?: string;
  description?: string;
  disabled?: boolean;
}

rules
  .command('list')
  .description('List filter rules')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('-c, --config <path>', 'Config file path')
  .option('--json', 'Output as JSON')
  .action(async (options: StoreOptions & { json?: boolean }) => {
    try {
      await withStore(options, async (store) => {
        const list = store.listFilterRules();
        if (options.json) {
          console.log(JSON.stringify(list, null, 2));
          return;
        }
        console.log('');
        log('  Filter Rules', 'bright');
        console.log('');
        printFilterRules(list);
        console.log('');
      });
    } catch (error) {
      fail(error);
    }
  });

rules
  .command('add <pattern>')
  .description('Add a filter rule (regular expression)')
  .requiredOption('-t, --type <type>', 'Attribute to match (url|host|content-type|method)')
  .option('--id <id>', 'Rule id (generated when omitted)')
  .option('-d, --description <text>', 'Description')
  .option('--disabled', 'Create the rule disabled')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('-c, --config <path>', 'Config file path')
  .action(async (pattern: string, options: RuleAddOptions) => {
    try {
      await withStore(options, async (store) => {
        const input = parseOrThrow(
          filterRuleInputSchema,
          {
            pattern,
            type: options.type,
            enabled: !options.disabled,
            ...(options.id ? { id: options.id } : {}),
            ...(options.description ? { description: options.description } : {}),
          },
          'filter rule'
        );
        const rule = await store.addFilterRule(input);
        log(`Added filter rule: ${rule.id}`, 'green');
      });
    } catch (error) {
      fail(error);
    }
  });

rules
  .command('update <id>')
  .description('Update a filter rule')
  .option('--pattern <pattern>', 'New pattern')
  .option('-t, --type <type>', 'New attribute type')
  .option('-d, --description <text>', 'New description')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('-c, --config <path>', 'Config file path')
  .action(async (id: string, options: StoreOptions & { pattern?: string; type?: string; description?: string }) => {
    try {
      await withStore(options, async (store) => {
        const current = store.getFilterRule(id);
        const next = parseOrThrow(
          filterRuleInputSchema,
          {
            ...current,
            ...(options.pattern !== undefined ? { pattern: options.pattern } : {}),
            ...(options.type !== undefined ? { type: options.type } : {}),
            ...(options.description !== undefined ? { description: options.description } : {}),
          },
          'filter rule'
        );
        const rule = await store.updateFilterRule(id, {
          pattern: next.pattern,
          type: next.type,
          ...(next.description !== undefined ? { description: next.description } : {}),
        });
        log(`Updated filter rule: ${rule.id}`, 'green');
      });
    } catch (error) {
      fail(error);
    }
  });

rules
  .command('delete <id>')
  .description('Delete a filter rule')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('-c, --config <path>', 'Config file path')
  .action(async (id: string, options: StoreOptions) => {
    try {
      await withStore(options, async (store) => {
        await store.deleteFilterRule(id);
        log(`Deleted filter rule: ${id}`, 'green');
      });
    } catch (error) {
      fail(error);
    }
  });

rules
  .command('toggle <id>')
  .description('Enable or disable a filter rule (flips it when neither flag is given)')
  .option('--on', 'Enable')
  .option('--off', 'Disable')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('-c, --config <path>', 'Config file path')
  .action(async (id: string, options: StoreOptions & { on?: boolean; off?: boolean }) => {
    try {
      await withStore(options, async (store) => {
        const enabled = options.on ? true : options.off ? false : !store.getFilterRule(id).enabled;
        const rule = await store.toggleFilterRule(id, enabled);
        log(`Filter rule ${rule.id} ${rule.enabled ? 'enabled' : 'disabled'}`, 'green');
      });
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// HOSTS COMMANDS
// ============================================================================
const hosts = program.command('hosts').description('Manage the host allow-list');

hosts
  .command('list')
  .description('List host rules')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('-c, --config <path>', 'Config file path')
  .option('--json', 'Output as JSON')
  .action(async (options: StoreOptions & { json?: boolean }) => {
    try {
      await withStore(options, async (store) => {
        const list = store.listHostRules();
        if (options.json) {
          console.log(JSON.stringify(list, null, 2));
          return;
        }
        console.log('');
        log('  Host Rules', 'bright');
        console.log('');
        printHostRules(list);
        console.log('');
      });
    } catch (error) {
      fail(error);
    }
  });

hosts
  .command('add <host>')
  .description('Allow a host')
  .option('--subdomains', 'Also allow every subdomain')
  .option('--id <id>', 'Rule id (generated when omitted)')
  .option('-d, --description <text>', 'Description')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('-c, --config <path>', 'Config file path')
  .action(async (host: string, options: StoreOptions & { subdomains?: boolean; id?: string; description?: string }) => {
    try {
      await withStore(options, async (store) => {
        const input = parseOrThrow(
          hostRuleInputSchema,
          {
            host,
            includeSubdomains: Boolean(options.subdomains),
            ...(options.id ? { id: options.id } : {}),
            ...(options.description ? { description: options.description } : {}),
          },
          'host rule'
        );
        const rule = await store.addHostRule(input);
        log(`Added host rule: ${rule.id} (${rule.host})`, 'green');
      });
    } catch (error) {
      fail(error);
    }
  });

hosts
  .command('delete <id>')
  .description('Delete a host rule')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('-c, --config <path>', 'Config file path')
  .action(async (id: string, options: StoreOptions) => {
    try {
      await withStore(options, async (store) => {
        const removed = await store.deleteHostRule(id);
        log(`Deleted host rule: ${removed.id} (${removed.host})`, 'green');
      });
    } catch (error) {
      fail(error);
    }
  });

hosts
  .command('toggle <id>')
  .description('Enable or disable a host rule (flips it when neither flag is given)')
  .option('--on', 'Enable')
  .option('--off', 'Disable')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('-c, --config <path>', 'Config file path')
  .action(async (id: string, options: StoreOptions & { on?: boolean; off?: boolean }) => {
    try {
      await withStore(options, async (store) => {
        const enabled = options.on ? true : options.off ? false : !store.getHostRule(id).enabled;
        const rule = await store.toggleHostRule(id, enabled);
        log(`Host rule ${rule.id} ${rule.enabled ? 'enabled' : 'disabled'}`, 'green');
      });
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// PRESETS COMMANDS
// ============================================================================
const presets = program.command('presets').description('List and apply preset rule bundles');

presets
  .command('list')
  .description('List available presets')
  .option('--presets <path>', 'Preset bundle file')
  .option('-c, --config <path>', 'Config file path')
  .action(async (options: StoreOptions) => {
    try {
      const config = await loadConfiguration(options);
      const bundle = await loadPresets(config.rules.presetsPath ?? DEFAULT_PRESETS_PATH);

      console.log('');
      log('  Presets', 'bright');
      console.log('');
      for (const preset of bundle) {
        console.log(
          `  ${colors.cyan}${preset.id.padEnd(22)}${colors.reset} ${preset.name.padEnd(24)} ${colors.dim}${preset.rules.length} rule(s)${colors.reset}`
        );
        log(`  ${''.padEnd(22)} ${preset.description}`, 'dim');
      }
      console.log('');
    } catch (error) {
      fail(error);
    }
  });

presets
  .command('apply <id>')
  .description('Merge a preset into the filter rules')
  .option('--presets <path>', 'Preset bundle file')
  .option('-s, --storage <path>', 'Rule storage file path')
  .option('-c, --config <path>', 'Config file path')
  .action(async (id: string, options: StoreOptions) => {
    try {
      await withStore(options, async (store) => {
        const applied = await store.applyPreset(id);
        log(`Applied preset ${id}: ${applied.length} rule(s)`, 'green');
        printFilterRules(store.listFilterRules());
      });
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync();
