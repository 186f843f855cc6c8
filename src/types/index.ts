export type FilterRuleType = 'url' | 'host' | 'content-type' | 'method';
export type StorageType = 'memory' | 'lowdb' | 'sqlite';
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface TrafficsmithConfig {
  port: number;
  storage: StorageConfig;
  rules: RulesConfig;
  model: ModelConfig;
  logging: LoggingConfig;
  output: OutputConfig;
}

export interface StorageConfig {
  type: StorageType;
  path: string;
}

export interface RulesConfig {
  /** Reload the engine when the rule or preset files change on disk */
  watch: boolean;
  /** Preset bundle file; the shipped presets are used when unset */
  presetsPath?: string;
}

export interface ModelConfig {
  ignoreHeaders: string[];
  /** Distinct values a path segment needs before it is templated by variance alone */
  varianceThreshold: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface OutputConfig {
  dir: string;
}

// ============================================================================
// Rules
// ============================================================================

export interface FilterRule {
  id: string;
  pattern: string;
  type: FilterRuleType;
  enabled: boolean;
  description?: string;
}

export interface HostRule {
  id: string;
  host: string;
  enabled: boolean;
  description?: string;
  includeSubdomains: boolean;
}

export interface Preset {
  id: string;
  name: string;
  description: string;
  version: 1;
  rules: readonly Readonly<FilterRule>[];
}

export interface PresetSummary {
  id: string;
  name: string;
  description: string;
  ruleCount: number;
}

/** Everything the rule store persists */
export interface RuleState {
  filterRules: FilterRule[];
  hostRules: HostRule[];
}

// ============================================================================
// Captured traffic
// ============================================================================

export interface CapturedBody {
  mimeType: string;
  raw: Buffer;
  text: string;
  /** Form fields reported by the capture tool for multipart bodies */
  params?: Array<{ name: string; value: string }>;
}

export interface RawExchange {
  readonly index: number;
  readonly method: string;
  readonly url: string;
  readonly scheme: string;
  readonly host: string;
  readonly port?: number;
  readonly path: string;
  readonly query: Readonly<Record<string, string | string[]>>;
  readonly requestHeaders: Readonly<Record<string, string>>;
  readonly responseHeaders: Readonly<Record<string, string>>;
  readonly status: number;
  readonly requestBody?: CapturedBody;
  readonly responseBody?: CapturedBody;
  readonly timestamp: number;
  readonly durationMs: number;
}

/** Attributes filter rules are matched against */
export interface ExchangeAttributes {
  method: string;
  host: string;
  url: string;
  contentType: string;
}

// ============================================================================
// Schemas & definitions
// ============================================================================

export type SchemaNode =
  | { kind: 'absent' }
  | { kind: 'null' }
  | { kind: 'boolean'; example?: boolean }
  | { kind: 'number'; integer: boolean; example?: number }
  | { kind: 'string'; format?: StringFormat; example?: string }
  | { kind: 'array'; items: SchemaNode }
  | { kind: 'object'; properties: Record<string, PropertySchema> }
  | { kind: 'union'; variants: SchemaNode[] }
  | { kind: 'blob'; mimeType: string; example?: string }
  | { kind: 'unknown' };

export type SchemaKind = SchemaNode['kind'];
export type StringFormat = 'uuid' | 'email' | 'uri' | 'date-time' | 'date';

export interface PropertySchema {
  schema: SchemaNode;
  required: boolean;
}

export interface ParameterModel {
  schema: SchemaNode;
  required: boolean;
  example?: string | string[];
}

export interface ApiDefinition {
  key: string;
  method: string;
  pathTemplate: string;
  description: string;
  hosts: string[];
  sampleCount: number;
  observedStatuses: number[];
  request: {
    pathParams: Record<string, ParameterModel>;
    headers: Record<string, ParameterModel>;
    queryParams: Record<string, ParameterModel>;
    bodySchema: SchemaNode;
  };
  response: {
    statusCode: number;
    headers: Record<string, ParameterModel>;
    bodySchema: SchemaNode;
  };
}

// ============================================================================
// Test cases
// ============================================================================

export type Assertion =
  | { type: 'status-equals'; expected: number }
  | { type: 'header-present'; header: string }
  | { type: 'json-schema'; schema: SchemaNode }
  | { type: 'field-present'; field: string };

export interface TestCase {
  id: string;
  apiDefinitionRef: string;
  name: string;
  type: 'functional';
  status: 'draft';
  request: {
    method: string;
    path: string;
    headers: Record<string, string>;
    query: Record<string, string | string[]>;
    body?: unknown;
  };
  expectedResponse: {
    status: number;
    schema: SchemaNode;
    assertions: Assertion[];
  };
  tags: string[];
}

// ============================================================================
// Diagnostics
// ============================================================================

export type Diagnostic =
  | { kind: 'PartialParseWarning'; entryIndex: number; message: string }
  | { kind: 'SchemaConflict'; definition: string; location: string; message: string };
