export { DEFAULT_CONFIG, CONFIG_FILE_NAMES } from './defaults.js';
export {
  loadConfig,
  loadConfigFile,
  findConfigFile,
  configFileToConfig,
  cliOptionsToConfig,
  mergeConfig,
  validateConfig,
  configFileSchema,
  type ConfigFile,
  type CliOptions,
} from './loader.js';
export {
  HotReloadService,
  createHotReload,
  type HotReloadConfig,
  type HotReloadStats,
  type RuleHotReloadOptions,
} from './hot-reload.js';
