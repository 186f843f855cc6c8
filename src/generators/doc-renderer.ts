/**
 * Documentation rendering - Markdown and OpenAPI 3.0 views of a catalogue.
 * Both are pure functions of the definition list.
 */

import type { ApiDefinition, ParameterModel, SchemaNode } from '../types/index.js';
import { describeSchema } from './schema-inferrer.js';
import { exampleValue, testCaseId } from './test-synthesizer.js';
import { createRecord } from '../core/records.js';

export interface RenderOptions {
  title?: string;
  version?: string;
}

const DEFAULT_TITLE = 'API Documentation';

// ============================================================================
// Markdown
// ============================================================================

export function renderMarkdown(definitions: readonly ApiDefinition[], options: RenderOptions = {}): string {
  const lines: string[] = [`# ${options.title ?? DEFAULT_TITLE}`, ''];

  if (definitions.length === 0) {
    lines.push('No endpoints captured.', '');
    return lines.join('\n');
  }

  for (const definition of definitions) {
    lines.push(...renderEndpoint(definition));
  }

  return lines.join('\n');
}

function renderEndpoint(definition: ApiDefinition): string[] {
  const lines: string[] = [
    `## ${definition.method} ${definition.pathTemplate}`,
    '',
    definition.description,
    '',
    `Hosts: ${definition.hosts.map((h) => `\`${h}\``).join(', ')}`,
    `Samples: ${definition.sampleCount}`,
    `Observed statuses: ${definition.observedStatuses.join(', ')}`,
    '',
    '### Request',
    '',
  ];

  lines.push(...parameterTable('Path parameters', definition.request.pathParams));
  lines.push(...parameterTable('Headers', definition.request.headers));
  lines.push(...parameterTable('Query parameters', definition.request.queryParams));
  lines.push(...bodySection(definition.request.bodySchema));

  lines.push('### Response', '', `Status: \`${definition.response.statusCode}\``, '');
  lines.push(...parameterTable('Headers', definition.response.headers));
  lines.push(...bodySection(definition.response.bodySchema));

  const example = exampleValue(definition.response.bodySchema);
  if (example !== undefined && definition.response.bodySchema.kind !== 'blob') {
    lines.push('#### Example', '', '```json', JSON.stringify(example, null, 2), '```', '');
  }

  return lines;
}

function parameterTable(title: string, params: Record<string, ParameterModel>): string[] {
  const names = Object.keys(params);
  if (names.length === 0) return [];

  const rows = names.map((name) => {
    const param = params[name];
    const example = param.example === undefined
      ? ''
      : `\`${cell(Array.isArray(param.example) ? param.example.join(', ') : param.example)}\``;
    return `| ${cell(name)} | ${cell(describeSchema(param.schema))} | ${param.required ? 'yes' : 'no'} | ${example} |`;
  });

  return [`#### ${title}`, '', '| Name | Type | Required | Example |', '|---|---|---|---|', ...rows, ''];
}

function bodySection(schema: SchemaNode): string[] {
  if (schema.kind === 'absent') return [];
  return ['#### Body', '', '```', describeSchema(schema), '```', ''];
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

// ============================================================================
// OpenAPI
// ============================================================================

export interface OpenApiSchema {
  type?: 'boolean' | 'integer' | 'number' | 'string' | 'array' | 'object';
  format?: string;
  nullable?: boolean;
  items?: OpenApiSchema;
  properties?: Record<string, OpenApiSchema>;
  required?: string[];
  oneOf?: OpenApiSchema[];
  example?: unknown;
}

export interface OpenApiParameter {
  name: string;
  in: 'path' | 'query' | 'header';
  required: boolean;
  schema: OpenApiSchema;
  example?: unknown;
}

export interface OpenApiOperation {
  operationId: string;
  summary: string;
  tags: string[];
  parameters: OpenApiParameter[];
  requestBody?: { required: boolean; content: Record<string, { schema: OpenApiSchema }> };
  responses: Record<string, { description: string; content?: Record<string, { schema: OpenApiSchema }> }>;
}

export interface OpenApiDocument {
  openapi: '3.0.3';
  info: { title: string; version: string; description: string };
  servers: Array<{ url: string }>;
  paths: Record<string, Record<string, OpenApiOperation>>;
}

/** Header names OpenAPI describes elsewhere and rejects as parameters */
const RESERVED_HEADERS = new Set(['accept', 'content-type', 'authorization']);

export function renderOpenApi(definitions: readonly ApiDefinition[], options: RenderOptions = {}): OpenApiDocument {
  const paths: OpenApiDocument['paths'] = {};
  const hosts = new Set<string>();

  for (const definition of definitions) {
    definition.hosts.forEach((host) => hosts.add(host));
    const item = paths[definition.pathTemplate] ?? {};
    item[definition.method.toLowerCase()] = toOperation(definition);
    paths[definition.pathTemplate] = item;
  }

  return {
    openapi: '3.0.3',
    info: {
      title: options.title ?? DEFAULT_TITLE,
      version: options.version ?? '1.0.0',
      description: 'Generated from captured traffic',
    },
    servers: Array.from(hosts).sort().map((host) => ({ url: `https://${host}` })),
    paths,
  };
}

function toOperation(definition: ApiDefinition): OpenApiOperation {
  const parameters: OpenApiParameter[] = [
    ...toParameters(definition.request.pathParams, 'path'),
    ...toParameters(definition.request.queryParams, 'query'),
    ...toParameters(definition.request.headers, 'header').filter((p) => !RESERVED_HEADERS.has(p.name)),
  ];

  const responses: OpenApiOperation['responses'] = {};
  for (const status of definition.observedStatuses) {
    responses[String(status)] = { description: 'Observed response' };
  }
  responses[String(definition.response.statusCode)] = {
    description: definition.response.statusCode < 400 ? 'Successful response' : 'Error response',
    ...bodyContent(definition.response.bodySchema),
  };

  const operation: OpenApiOperation = {
    operationId: testCaseId(definition).replace(/^tc-/, ''),
    summary: definition.description,
    tags: definition.pathTemplate.split('/').filter((s) => s && !s.startsWith('{')).slice(0, 1),
    parameters,
    responses,
  };

  const requestContent = bodyContent(definition.request.bodySchema);
  if (requestContent.content) {
    operation.requestBody = { required: true, content: requestContent.content };
  }

  return operation;
}

function toParameters(params: Record<string, ParameterModel>, location: OpenApiParameter['in']): OpenApiParameter[] {
  return Object.entries(params).map(([name, param]) => ({
    name,
    in: location,
    required: location === 'path' ? true : param.required,
    schema: toOpenApiSchema(param.schema, false),
    ...(param.example !== undefined ? { example: param.example } : {}),
  }));
}

function bodyContent(schema: SchemaNode): { content?: Record<string, { schema: OpenApiSchema }> } {
  if (schema.kind === 'absent') return {};
  const mimeType = schema.kind === 'blob' ? schema.mimeType || 'application/octet-stream' : 'application/json';
  return { content: { [mimeType]: { schema: toOpenApiSchema(schema) } } };
}

/**
 * Convert an inferred schema. Null variants become `nullable`.
 */
export function toOpenApiSchema(node: SchemaNode, withExamples: boolean = true): OpenApiSchema {
  switch (node.kind) {
    case 'absent':
    case 'unknown':
      return {};
    case 'null':
      return { nullable: true };
    case 'boolean':
      return withExample({ type: 'boolean' }, node.example, withExamples);
    case 'number':
      return withExample({ type: node.integer ? 'integer' : 'number' }, node.example, withExamples);
    case 'string':
      return withExample(
        node.format ? { type: 'string', format: node.format } : { type: 'string' },
        node.example,
        withExamples
      );
    case 'array':
      return { type: 'array', items: toOpenApiSchema(node.items, withExamples) };
    case 'object': {
      const properties = createRecord<OpenApiSchema>();
      const required: string[] = [];
      for (const [name, prop] of Object.entries(node.properties)) {
        properties[name] = toOpenApiSchema(prop.schema, withExamples);
        if (prop.required) required.push(name);
      }
      return required.length > 0 ? { type: 'object', properties, required } : { type: 'object', properties };
    }
    case 'union': {
      const nullable = node.variants.some((v) => v.kind === 'null');
      const rest = node.variants.filter((v) => v.kind !== 'null').map((v) => toOpenApiSchema(v, withExamples));
      const base: OpenApiSchema = rest.length === 1 ? rest[0] : { oneOf: rest };
      return nullable ? { ...base, nullable: true } : base;
    }
    case 'blob':
      return { type: 'string', format: 'binary' };
  }
}

function withExample(schema: OpenApiSchema, example: unknown, enabled: boolean): OpenApiSchema {
  return enabled && example !== undefined ? { ...schema, example } : schema;
}
