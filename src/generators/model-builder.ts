/**
 * Model Builder - turns filtered exchanges into a catalogue of API definitions
 *
 * Every exchange first becomes a one-sample definition; a group's definition
 * is the left fold of its samples under `mergeDefinitions`. `mergeCatalogues`
 * uses the same join, so building in batches and merging the results gives
 * the same catalogue as building everything at once.
 */

import type {
  ApiDefinition,
  CapturedBody,
  Diagnostic,
  ParameterModel,
  RawExchange,
  SchemaNode,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { throwIfCancelled } from '../core/errors.js';
import { type Logger, silentLogger } from '../core/logger.js';
import { createRecord, ownValue } from '../core/records.js';
import {
  ABSENT,
  describeSchema,
  findWidenings,
  inferScalar,
  inferSchema,
  joinSchemas,
} from './schema-inferrer.js';
import { templatePaths } from './path-template.js';

export const DEFAULT_IGNORED_HEADERS: readonly string[] = DEFAULT_CONFIG.model.ignoreHeaders;
export const DEFAULT_VARIANCE_THRESHOLD = DEFAULT_CONFIG.model.varianceThreshold;

export interface ModelBuilderOptions {
  ignoreHeaders?: readonly string[];
  varianceThreshold?: number;
  logger?: Logger;
}

export interface BuildOptions {
  signal?: AbortSignal;
}

export interface HostStats {
  count: number;
  methods: Record<string, number>;
}

export interface BuildStats {
  total: number;
  included: number;
  excluded: number;
  hostStats: Record<string, HostStats>;
}

export interface BuildResult {
  definitions: ApiDefinition[];
  diagnostics: Diagnostic[];
  stats: BuildStats;
}

export class ModelBuilder {
  private ignoredHeaders: Set<string>;
  private varianceThreshold: number;
  private logger: Logger;

  constructor(options: ModelBuilderOptions = {}) {
    this.ignoredHeaders = new Set(
      (options.ignoreHeaders ?? DEFAULT_IGNORED_HEADERS).map((h) => h.toLowerCase())
    );
    this.varianceThreshold = options.varianceThreshold ?? DEFAULT_VARIANCE_THRESHOLD;
    this.logger = (options.logger ?? silentLogger).child({ component: 'model-builder' });
  }

  /**
   * Filter, template, group and merge exchanges into definitions
   */
  build(
    exchanges: Iterable<RawExchange>,
    includePredicate: (exchange: RawExchange) => boolean,
    options: BuildOptions = {}
  ): BuildResult {
    const { signal } = options;
    const kept: RawExchange[] = [];
    const hostStats = createRecord<HostStats>();
    let total = 0;

    for (const exchange of exchanges) {
      throwIfCancelled(signal, 'model build');
      total++;
      if (!includePredicate(exchange)) continue;

      kept.push(exchange);
      const stats = ownValue(hostStats, exchange.host) ?? { count: 0, methods: createRecord<number>() };
      stats.count++;
      stats.methods[exchange.method] = (ownValue(stats.methods, exchange.method) ?? 0) + 1;
      hostStats[exchange.host] = stats;
    }

    const templates = templatePaths(kept, this.varianceThreshold);
    const groups = new Map<string, ApiDefinition>();

    kept.forEach((exchange, index) => {
      throwIfCancelled(signal, 'model build');
      const sample = this.sampleDefinition(exchange, templates[index].template, templates[index].params);
      const existing = groups.get(sample.key);
      groups.set(sample.key, existing ? mergeDefinitions(existing, sample) : sample);
    });

    const definitions: ApiDefinition[] = [];
    for (const definition of groups.values()) {
      throwIfCancelled(signal, 'model build');
      definitions.push(definition);
    }

    const diagnostics = collectConflicts(definitions);
    this.logger.info(
      { total, included: kept.length, definitions: definitions.length, conflicts: diagnostics.length },
      'catalogue built'
    );

    return {
      definitions,
      diagnostics,
      stats: { total, included: kept.length, excluded: total - kept.length, hostStats },
    };
  }

  /**
   * One-sample definition for a single exchange
   */
  sampleDefinition(exchange: RawExchange, pathTemplate: string, pathParams: Record<string, string>): ApiDefinition {
    const key = definitionKey(exchange.method, pathTemplate);

    return {
      key,
      method: exchange.method,
      pathTemplate,
      description: `${exchange.method} ${pathTemplate}`,
      hosts: [exchange.host],
      sampleCount: 1,
      observedStatuses: [exchange.status],
      request: {
        pathParams: mapValues(pathParams, (value) => ({ schema: inferScalar(value), required: true, example: value })),
        headers: this.headerModels(exchange.requestHeaders),
        queryParams: mapValues({ ...exchange.query }, queryModel),
        bodySchema: bodySchema(exchange.requestBody),
      },
      response: {
        statusCode: exchange.status,
        headers: this.headerModels(exchange.responseHeaders),
        bodySchema: bodySchema(exchange.responseBody),
      },
    };
  }

  private headerModels(headers: Readonly<Record<string, string>>): Record<string, ParameterModel> {
    const models = createRecord<ParameterModel>();
    for (const name of Object.keys(headers).sort()) {
      if (this.ignoredHeaders.has(name)) continue;
      models[name] = { schema: inferSchema(headers[name]), required: true, example: headers[name] };
    }
    return models;
  }
}

export function definitionKey(method: string, pathTemplate: string): string {
  return `${method.toUpperCase()} ${pathTemplate}`;
}

/**
 * Merge two catalogues. Definitions keep the left catalogue's order; keys
 * seen only on the right are appended in their order.
 */
export function mergeCatalogues(left: readonly ApiDefinition[], right: readonly ApiDefinition[]): ApiDefinition[] {
  const merged = new Map<string, ApiDefinition>();
  for (const definition of [...left, ...right]) {
    const existing = merged.get(definition.key);
    merged.set(definition.key, existing ? mergeDefinitions(existing, definition) : definition);
  }
  return Array.from(merged.values());
}

/**
 * Join two definitions of the same key; `right` holds the later samples
 */
export function mergeDefinitions(left: ApiDefinition, right: ApiDefinition): ApiDefinition {
  const leftOk = isSuccess(left.response.statusCode);
  const rightOk = isSuccess(right.response.statusCode);

  let response: ApiDefinition['response'];
  if (leftOk === rightOk) {
    response = {
      statusCode: right.response.statusCode,
      headers: joinParameters(left.response.headers, right.response.headers),
      bodySchema: joinSchemas(left.response.bodySchema, right.response.bodySchema),
    };
  } else {
    response = leftOk ? left.response : right.response;
  }

  return {
    key: left.key,
    method: left.method,
    pathTemplate: left.pathTemplate,
    description: left.description,
    hosts: sortedUnion(left.hosts, right.hosts),
    sampleCount: left.sampleCount + right.sampleCount,
    observedStatuses: sortedUnion(left.observedStatuses, right.observedStatuses),
    request: {
      pathParams: joinParameters(left.request.pathParams, right.request.pathParams),
      headers: joinParameters(left.request.headers, right.request.headers),
      queryParams: joinParameters(left.request.queryParams, right.request.queryParams),
      bodySchema: joinSchemas(left.request.bodySchema, right.request.bodySchema),
    },
    response,
  };
}

/**
 * A parameter missing on either side becomes optional
 */
export function joinParameters(
  left: Record<string, ParameterModel>,
  right: Record<string, ParameterModel>
): Record<string, ParameterModel> {
  const names = Array.from(new Set([...Object.keys(left), ...Object.keys(right)])).sort();
  const joined = createRecord<ParameterModel>();

  for (const name of names) {
    const a = ownValue(left, name);
    const b = ownValue(right, name);
    if (a && b) {
      const example = b.example ?? a.example;
      joined[name] = {
        schema: joinSchemas(a.schema, b.schema),
        required: a.required && b.required,
        ...(example !== undefined ? { example } : {}),
      };
    } else {
      joined[name] = { ...(a ?? b), required: false };
    }
  }

  return joined;
}

/**
 * SchemaConflict diagnostics for every widened location in the catalogue
 */
export function collectConflicts(definitions: readonly ApiDefinition[]): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const definition of definitions) {
    const roots: Array<[string, SchemaNode]> = [
      ['request.body', definition.request.bodySchema],
      ['response.body', definition.response.bodySchema],
    ];
    for (const [name, param] of Object.entries(definition.request.queryParams)) {
      roots.push([`request.query.${name}`, param.schema]);
    }
    for (const [name, param] of Object.entries(definition.request.pathParams)) {
      roots.push([`request.path.${name}`, param.schema]);
    }

    for (const [root, schema] of roots) {
      for (const widening of findWidenings(schema, root)) {
        diagnostics.push({
          kind: 'SchemaConflict',
          definition: definition.key,
          location: widening.location,
          message:
            widening.widenedTo === 'unknown'
              ? 'conflicting types widened to any'
              : `conflicting types widened to ${widening.kinds.join(' | ')}`,
        });
      }
    }
  }

  return diagnostics;
}

// ============================================================================
// Bodies
// ============================================================================

/**
 * Schema of a captured body. Structured bodies (JSON, forms) become object
 * schemas; anything else is kept as an opaque blob.
 */
export function bodySchema(body: CapturedBody | undefined): SchemaNode {
  if (!body) return ABSENT;

  const mimeType = body.mimeType.split(';')[0].trim().toLowerCase();
  const trimmed = body.text.trim();

  if (isJsonType(mimeType) || trimmed.startsWith('{') || trimmed.startsWith('[')) {
    try {
      return inferSchema(JSON.parse(body.text));
    } catch {
      return blob(mimeType || 'application/json', body);
    }
  }

  if (mimeType === 'application/x-www-form-urlencoded') {
    return inferSchema(formFields(new URLSearchParams(body.text)));
  }

  if (mimeType.startsWith('multipart/') && body.params && body.params.length > 0) {
    return inferSchema(formFields(body.params.map((p) => [p.name, p.value])));
  }

  return blob(mimeType, body);
}

function blob(mimeType: string, body: CapturedBody): SchemaNode {
  if (mimeType.startsWith('text/') && body.text.length > 0) {
    return { kind: 'blob', mimeType, example: body.text };
  }
  return { kind: 'blob', mimeType };
}

function isJsonType(mimeType: string): boolean {
  return mimeType === 'application/json' || mimeType.endsWith('+json');
}

function formFields(pairs: Iterable<[string, string]>): Record<string, string | string[]> {
  const fields = createRecord<string | string[]>();
  for (const [name, value] of pairs) {
    const existing = ownValue(fields, name);
    if (existing === undefined) {
      fields[name] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      fields[name] = [existing, value];
    }
  }
  return fields;
}

// ============================================================================
// Helpers
// ============================================================================

function queryModel(value: string | string[]): ParameterModel {
  if (Array.isArray(value)) {
    return {
      schema: { kind: 'array', items: value.reduce<SchemaNode>((acc, v) => joinSchemas(acc, inferScalar(v)), ABSENT) },
      required: true,
      example: [...value],
    };
  }
  return { schema: inferScalar(value), required: true, example: value };
}

function mapValues<T>(record: Record<string, T>, fn: (value: T) => ParameterModel): Record<string, ParameterModel> {
  const mapped = createRecord<ParameterModel>();
  for (const key of Object.keys(record).sort()) {
    mapped[key] = fn(record[key]);
  }
  return mapped;
}

function sortedUnion<T extends string | number>(a: readonly T[], b: readonly T[]): T[] {
  return Array.from(new Set([...a, ...b])).sort((x, y) => (x < y ? -1 : x > y ? 1 : 0));
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Short textual form of a definition, used by the CLI summary
 */
export function summarizeDefinition(definition: ApiDefinition): string {
  return `${definition.key} -> ${definition.response.statusCode} ${describeSchema(definition.response.bodySchema)}`;
}
