export { TrafficsmithServer, type ServerEvents } from './core/server.js';
export * from './types/index.js';
export * from './storage/index.js';
export {
  RuleStore,
  type RuleStoreOptions,
  type RuleSnapshot,
  type RuleStoreListener,
} from './core/rule-store.js';
export {
  RuleEngine,
  compileSnapshot,
  evaluateAgainst,
  hostMatches,
  toAttributes,
  type CompiledSnapshot,
  type CompiledFilterRule,
  type Evaluation,
  type EvaluationReason,
  type IncludePredicate,
} from './core/rule-engine.js';
export {
  Pipeline,
  ARTIFACT_FILES,
  type CaptureInput,
  type CatalogueResult,
  type CatalogueStats,
  type GeneratedArtifacts,
  type PipelineOptions,
  type PublishArtifacts,
  type RunOptions,
} from './core/pipeline.js';
export { DEFAULT_PRESETS_PATH, loadPresets, parsePresets } from './core/presets.js';
export {
  TrafficsmithError,
  InvalidPatternError,
  NotFoundError,
  ValidationError,
  MalformedCaptureError,
  CancelledError,
  throwIfCancelled,
  toTrafficsmithError,
  type ErrorBody,
  type ErrorCode,
} from './core/errors.js';
export { createLogger, silentLogger, type Logger } from './core/logger.js';
export { Mutex } from './core/mutex.js';
export {
  apiDefinitionSchema,
  catalogueSchema,
  schemaNodeSchema,
  type FilterRuleInput,
  type FilterRulePatch,
  type HostRuleInput,
  type HostRulePatch,
} from './core/validation.js';
export { CaptureParser, CaptureStream } from './capture/har-parser.js';
export * from './generators/index.js';
export * from './config/index.js';
