/**
 * Test Synthesizer - one draft functional test case per API definition
 *
 * Requests are instantiated from recorded examples. Expected responses assert
 * status and structure only, never exact bodies.
 */

import type { ApiDefinition, Assertion, SchemaNode, TestCase } from '../types/index.js';
import { throwIfCancelled } from '../core/errors.js';
import { createRecord, ownValue } from '../core/records.js';

export interface SynthesizeOptions {
  signal?: AbortSignal;
}

export class TestSynthesizer {
  /**
   * Build test cases in catalogue order. Ids are derived from method and path,
   * with the lowest free numeric suffix when an id is already taken.
   */
  synthesize(definitions: readonly ApiDefinition[], options: SynthesizeOptions = {}): TestCase[] {
    const issued = new Set<string>();

    return definitions.map((definition) => {
      throwIfCancelled(options.signal, 'test synthesis');
      const baseId = testCaseId(definition);
      let id = baseId;
      for (let n = 2; issued.has(id); n++) {
        id = `${baseId}-${n}`;
      }
      issued.add(id);
      return this.synthesizeOne(definition, id);
    });
  }

  synthesizeOne(definition: ApiDefinition, id: string = testCaseId(definition)): TestCase {
    const body = exampleValue(definition.request.bodySchema);

    return {
      id,
      apiDefinitionRef: definition.key,
      name: definition.description || definition.key,
      type: 'functional',
      status: 'draft',
      request: {
        method: definition.method,
        path: concretePath(definition),
        headers: requiredExamples(definition.request.headers),
        query: requiredQuery(definition),
        ...(body !== undefined ? { body } : {}),
      },
      expectedResponse: {
        status: definition.response.statusCode,
        schema: definition.response.bodySchema,
        assertions: buildAssertions(definition),
      },
      tags: buildTags(definition),
    };
  }
}

export function testCaseId(definition: ApiDefinition): string {
  const slug = definition.pathTemplate
    .replace(/[{}]/g, '')
    .replace(/[^a-zA-Z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();
  return `tc-${definition.method.toLowerCase()}-${slug || 'root'}`;
}

function concretePath(definition: ApiDefinition): string {
  return definition.pathTemplate.replace(/\{([^}]+)\}/g, (_match, name: string) => {
    const param = ownValue(definition.request.pathParams, name);
    if (!param) return name;
    const example = Array.isArray(param.example) ? param.example[0] : param.example;
    return encodeURIComponent(example ?? String(exampleValue(param.schema) ?? name));
  });
}

function requiredExamples(models: ApiDefinition['request']['headers']): Record<string, string> {
  const values = createRecord<string>();
  for (const [name, model] of Object.entries(models)) {
    if (!model.required || model.example === undefined) continue;
    values[name] = Array.isArray(model.example) ? model.example.join(', ') : model.example;
  }
  return values;
}

function requiredQuery(definition: ApiDefinition): Record<string, string | string[]> {
  const values = createRecord<string | string[]>();
  for (const [name, model] of Object.entries(definition.request.queryParams)) {
    if (model.required && model.example !== undefined) {
      values[name] = model.example;
    }
  }
  return values;
}

function buildAssertions(definition: ApiDefinition): Assertion[] {
  const assertions: Assertion[] = [{ type: 'status-equals', expected: definition.response.statusCode }];

  for (const [name, model] of Object.entries(definition.response.headers)) {
    if (model.required) {
      assertions.push({ type: 'header-present', header: name });
    }
  }

  const schema = definition.response.bodySchema;
  if (isStructured(schema)) {
    assertions.push({ type: 'json-schema', schema });
  }
  if (schema.kind === 'object') {
    for (const [field, prop] of Object.entries(schema.properties)) {
      if (prop.required) {
        assertions.push({ type: 'field-present', field });
      }
    }
  }

  return assertions;
}

function buildTags(definition: ApiDefinition): string[] {
  const tags = [definition.method.toLowerCase()];
  const resource = definition.pathTemplate.split('/').find((segment) => segment && !segment.startsWith('{'));
  if (resource) {
    tags.push(resource);
  }
  return tags;
}

function isStructured(schema: SchemaNode): boolean {
  return schema.kind !== 'absent' && schema.kind !== 'blob' && schema.kind !== 'unknown';
}

/**
 * Concrete example for a schema, from recorded examples where present
 */
export function exampleValue(schema: SchemaNode): unknown {
  switch (schema.kind) {
    case 'absent':
      return undefined;
    case 'null':
    case 'unknown':
      return null;
    case 'boolean':
      return schema.example ?? true;
    case 'number':
      return schema.example ?? (schema.integer ? 1 : 1.5);
    case 'string':
      return schema.example ?? formatExample(schema.format);
    case 'array':
      return schema.items.kind === 'absent' ? [] : [exampleValue(schema.items)];
    case 'object': {
      const value = createRecord<unknown>();
      for (const [name, prop] of Object.entries(schema.properties)) {
        if (prop.required) {
          value[name] = exampleValue(prop.schema);
        }
      }
      return value;
    }
    case 'union': {
      const preferred = schema.variants.find((v) => v.kind !== 'null') ?? schema.variants[0];
      return exampleValue(preferred);
    }
    case 'blob':
      return schema.example;
  }
}

function formatExample(format: string | undefined): string {
  switch (format) {
    case 'uuid':
      return '00000000-0000-4000-8000-000000000000';
    case 'email':
      return 'user@example.com';
    case 'uri':
      return 'https://example.com';
    case 'date-time':
      return '2024-01-01T00:00:00Z';
    case 'date':
      return '2024-01-01';
    default:
      return 'string';
  }
}
