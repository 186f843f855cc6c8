import type { SchemaNode } from '../types/index.js';
import { describeSchema } from './schema-inferrer.js';

/**
 * Structural conformance of a value to an inferred schema. Returns one
 * message per violation; an empty list means the value conforms. Examples
 * and string formats are not checked.
 */
export function checkConformance(value: unknown, schema: SchemaNode, path: string = '$'): string[] {
  switch (schema.kind) {
    case 'absent':
    case 'unknown':
    case 'blob':
      return [];
    case 'null':
      return value === null ? [] : [mismatch(path, schema, value)];
    case 'boolean':
      return typeof value === 'boolean' ? [] : [mismatch(path, schema, value)];
    case 'number':
      if (typeof value !== 'number') return [mismatch(path, schema, value)];
      return schema.integer && !Number.isInteger(value) ? [mismatch(path, schema, value)] : [];
    case 'string':
      return typeof value === 'string' ? [] : [mismatch(path, schema, value)];
    case 'array':
      if (!Array.isArray(value)) return [mismatch(path, schema, value)];
      return value.flatMap((item, i) => checkConformance(item, schema.items, `${path}[${i}]`));
    case 'object': {
      if (!isRecord(value)) return [mismatch(path, schema, value)];
      const violations: string[] = [];
      for (const [name, prop] of Object.entries(schema.properties)) {
        if (!Object.hasOwn(value, name)) {
          if (prop.required) violations.push(`${path}.${name}: required field missing`);
          continue;
        }
        violations.push(...checkConformance(value[name], prop.schema, `${path}.${name}`));
      }
      return violations;
    }
    case 'union':
      return schema.variants.some((variant) => checkConformance(value, variant, path).length === 0)
        ? []
        : [mismatch(path, schema, value)];
  }
}

function mismatch(path: string, schema: SchemaNode, value: unknown): string {
  return `${path}: expected ${describeSchema(schema)}, got ${typeOf(value)}`;
}

function typeOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && Number.isInteger(value)) return 'integer';
  return typeof value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
