/**
 * Schema Inference - structural schemas from observed values
 *
 * Inferred schemas are SchemaNode trees. Joining two trees is commutative and
 * associative on structure; for example values the right-hand side wins, so
 * joining samples in capture order keeps the most recent example.
 */

import type { PropertySchema, SchemaKind, SchemaNode, StringFormat } from '../types/index.js';
import { createRecord, ownValue } from '../core/records.js';

/** Unions wider than this collapse to `unknown` */
export const MAX_UNION_VARIANTS = 4;

const KIND_ORDER: SchemaKind[] = [
  'null',
  'boolean',
  'number',
  'string',
  'array',
  'object',
  'blob',
  'union',
  'unknown',
  'absent',
];

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const URI_PATTERN = /^https?:\/\//;
const DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const ABSENT: SchemaNode = Object.freeze({ kind: 'absent' });
export const UNKNOWN: SchemaNode = Object.freeze({ kind: 'unknown' });

/**
 * Infer a schema from one JSON-like value
 */
export function inferSchema(value: unknown): SchemaNode {
  if (value === undefined) {
    return ABSENT;
  }

  if (value === null) {
    return { kind: 'null' };
  }

  if (Array.isArray(value)) {
    return {
      kind: 'array',
      items: value.reduce<SchemaNode>((acc, item) => joinSchemas(acc, inferSchema(item)), ABSENT),
    };
  }

  if (typeof value === 'object') {
    const properties = createRecord<PropertySchema>();
    for (const [key, val] of Object.entries(value)) {
      properties[key] = { schema: inferSchema(val), required: true };
    }
    return { kind: 'object', properties };
  }

  if (typeof value === 'string') {
    const format = detectFormat(value);
    return format ? { kind: 'string', format, example: value } : { kind: 'string', example: value };
  }

  if (typeof value === 'number') {
    return { kind: 'number', integer: Number.isInteger(value), example: value };
  }

  if (typeof value === 'boolean') {
    return { kind: 'boolean', example: value };
  }

  return UNKNOWN;
}

/**
 * Infer the type of a scalar carried as text (query strings, path segments)
 */
export function inferScalar(text: string): SchemaNode {
  if (/^-?\d+$/.test(text) && Number.isSafeInteger(Number(text))) {
    return { kind: 'number', integer: true, example: Number(text) };
  }
  if (/^-?\d*\.\d+$/.test(text)) {
    return { kind: 'number', integer: false, example: Number(text) };
  }
  if (text === 'true' || text === 'false') {
    return { kind: 'boolean', example: text === 'true' };
  }
  return inferSchema(text);
}

export function detectFormat(value: string): StringFormat | undefined {
  if (UUID_PATTERN.test(value)) return 'uuid';
  if (EMAIL_PATTERN.test(value)) return 'email';
  if (URI_PATTERN.test(value)) return 'uri';
  if (DATE_TIME_PATTERN.test(value)) return 'date-time';
  if (DATE_PATTERN.test(value)) return 'date';
  return undefined;
}

/**
 * Join two schema nodes
 */
export function joinSchemas(left: SchemaNode, right: SchemaNode): SchemaNode {
  if (left.kind === 'absent') return right;
  if (right.kind === 'absent') return left;
  if (left.kind === 'unknown' || right.kind === 'unknown') return UNKNOWN;

  if (left.kind === 'union' || right.kind === 'union') {
    return joinVariants([...variantsOf(left), ...variantsOf(right)]);
  }

  if (left.kind !== right.kind) {
    return joinVariants([left, right]);
  }

  return joinSameKind(left, right);
}

/**
 * Join two object property maps; a property missing on either side is optional
 */
export function joinProperties(
  left: Record<string, PropertySchema>,
  right: Record<string, PropertySchema>
): Record<string, PropertySchema> {
  const merged = createRecord<PropertySchema>();

  for (const [name, prop] of Object.entries(left)) {
    const other = ownValue(right, name);
    merged[name] = other
      ? { schema: joinSchemas(prop.schema, other.schema), required: prop.required && other.required }
      : { schema: prop.schema, required: false };
  }

  for (const [name, prop] of Object.entries(right)) {
    if (!Object.hasOwn(merged, name)) {
      merged[name] = { schema: prop.schema, required: false };
    }
  }

  return sortRecord(merged);
}

function joinSameKind(left: SchemaNode, right: SchemaNode): SchemaNode {
  switch (left.kind) {
    case 'null':
      return left;
    case 'boolean': {
      const example = right.kind === 'boolean' && right.example !== undefined ? right.example : left.example;
      return example === undefined ? { kind: 'boolean' } : { kind: 'boolean', example };
    }
    case 'number': {
      if (right.kind !== 'number') break;
      const example = right.example ?? left.example;
      const node: SchemaNode = { kind: 'number', integer: left.integer && right.integer };
      return example === undefined ? node : { ...node, example };
    }
    case 'string': {
      if (right.kind !== 'string') break;
      const example = right.example ?? left.example;
      const format = left.format === right.format ? left.format : undefined;
      return {
        kind: 'string',
        ...(format ? { format } : {}),
        ...(example !== undefined ? { example } : {}),
      };
    }
    case 'array':
      if (right.kind !== 'array') break;
      return { kind: 'array', items: joinSchemas(left.items, right.items) };
    case 'object':
      if (right.kind !== 'object') break;
      return { kind: 'object', properties: joinProperties(left.properties, right.properties) };
    case 'blob': {
      if (right.kind !== 'blob') break;
      const example = right.example ?? left.example;
      return {
        kind: 'blob',
        mimeType: left.mimeType === right.mimeType ? left.mimeType : 'application/octet-stream',
        ...(example !== undefined ? { example } : {}),
      };
    }
    default:
      break;
  }
  return joinVariants([left, right]);
}

/**
 * Flatten into one variant per kind, in a fixed kind order
 */
function joinVariants(nodes: SchemaNode[]): SchemaNode {
  const byKind = new Map<SchemaKind, SchemaNode>();
  for (const node of nodes) {
    if (node.kind === 'absent') continue;
    if (node.kind === 'unknown') return UNKNOWN;
    const existing = byKind.get(node.kind);
    byKind.set(node.kind, existing ? joinSameKind(existing, node) : node);
  }

  const variants = Array.from(byKind.values()).sort(
    (a, b) => KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind)
  );

  if (variants.length === 0) return ABSENT;
  if (variants.length === 1) return variants[0];
  if (variants.length > MAX_UNION_VARIANTS) return UNKNOWN;
  return { kind: 'union', variants };
}

function variantsOf(node: SchemaNode): SchemaNode[] {
  return node.kind === 'union' ? node.variants : [node];
}

function sortRecord<T>(record: Record<string, T>): Record<string, T> {
  const sorted = createRecord<T>();
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return sorted;
}

export interface SchemaWidening {
  location: string;
  kinds: SchemaKind[];
  widenedTo: 'union' | 'unknown';
}

/**
 * Find places where differing non-null kinds were widened. A union of one
 * kind with null is a nullable field, not a conflict.
 */
export function findWidenings(node: SchemaNode, location: string = '$'): SchemaWidening[] {
  switch (node.kind) {
    case 'unknown':
      return [{ location, kinds: [], widenedTo: 'unknown' }];
    case 'union': {
      const kinds = node.variants.map((v) => v.kind);
      const found: SchemaWidening[] = [];
      if (kinds.filter((k) => k !== 'null').length > 1) {
        found.push({ location, kinds, widenedTo: 'union' });
      }
      for (const variant of node.variants) {
        found.push(...findWidenings(variant, location));
      }
      return found;
    }
    case 'array':
      return findWidenings(node.items, `${location}[]`);
    case 'object':
      return Object.entries(node.properties).flatMap(([name, prop]) =>
        findWidenings(prop.schema, `${location}.${name}`)
      );
    default:
      return [];
  }
}

/**
 * Render a schema as a compact type expression, e.g. `{ id: integer; tags?: string[] }`
 */
export function describeSchema(node: SchemaNode): string {
  switch (node.kind) {
    case 'absent':
      return 'none';
    case 'null':
      return 'null';
    case 'boolean':
      return 'boolean';
    case 'number':
      return node.integer ? 'integer' : 'number';
    case 'string':
      return node.format ? `string(${node.format})` : 'string';
    case 'array':
      return node.items.kind === 'absent' ? 'unknown[]' : `${wrapUnion(node.items)}[]`;
    case 'object': {
      const fields = Object.entries(node.properties).map(
        ([name, prop]) => `${name}${prop.required ? '' : '?'}: ${describeSchema(prop.schema)}`
      );
      return fields.length === 0 ? '{}' : `{ ${fields.join('; ')} }`;
    }
    case 'union':
      return node.variants.map((v) => describeSchema(v)).join(' | ');
    case 'blob':
      return `blob(${node.mimeType || 'unknown'})`;
    case 'unknown':
      return 'any';
  }
}

function wrapUnion(node: SchemaNode): string {
  const text = describeSchema(node);
  return node.kind === 'union' ? `(${text})` : text;
}
