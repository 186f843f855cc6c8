import { z } from 'zod';
import type { ApiDefinition, SchemaNode } from '../types/index.js';
import { InvalidPatternError, ValidationError } from './errors.js';

export const FILTER_RULE_TYPES = ['url', 'host', 'content-type', 'method'] as const;

const HOST_PATTERN = /^[a-zA-Z0-9][-a-zA-Z0-9]*(\.[a-zA-Z0-9][-a-zA-Z0-9]*)*$/;

export const filterRuleSchema = z.object({
  id: z.string().trim().min(1, 'Rule id required'),
  pattern: z.string().min(1, 'Pattern required'),
  type: z.enum(FILTER_RULE_TYPES),
  enabled: z.boolean(),
  description: z.string().optional(),
});

/** Input accepted when creating a rule; the store fills in the id */
export const filterRuleInputSchema = filterRuleSchema.extend({
  id: z.string().trim().min(1).optional(),
  enabled: z.boolean().default(true),
});

export const filterRulePatchSchema = filterRuleSchema.omit({ id: true }).partial();

export const hostRuleSchema = z.object({
  id: z.string().trim().min(1, 'Rule id required'),
  host: z.string().regex(HOST_PATTERN, 'Invalid host format'),
  enabled: z.boolean(),
  description: z.string().optional(),
  includeSubdomains: z.boolean(),
});

export const hostRuleInputSchema = hostRuleSchema.extend({
  id: z.string().trim().min(1).optional(),
  enabled: z.boolean().default(true),
  includeSubdomains: z.boolean().default(false),
});

export const hostRulePatchSchema = hostRuleSchema.omit({ id: true }).partial();

export const presetSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  version: z.literal(1),
  rules: z.array(filterRuleSchema),
});

export const presetFileSchema = z.object({
  version: z.literal(1),
  presets: z.array(presetSchema),
});

export const ruleStateSchema = z.object({
  filterRules: z.array(filterRuleSchema),
  hostRules: z.array(hostRuleSchema),
});

// ============================================================================
// Catalogue (definitions posted back for test generation)
// ============================================================================

const STRING_FORMATS = ['uuid', 'email', 'uri', 'date-time', 'date'] as const;

export const schemaNodeSchema: z.ZodType<SchemaNode> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('absent') }),
    z.object({ kind: z.literal('null') }),
    z.object({ kind: z.literal('boolean'), example: z.boolean().optional() }),
    z.object({ kind: z.literal('number'), integer: z.boolean(), example: z.number().optional() }),
    z.object({ kind: z.literal('string'), format: z.enum(STRING_FORMATS).optional(), example: z.string().optional() }),
    z.object({ kind: z.literal('array'), items: schemaNodeSchema }),
    z.object({
      kind: z.literal('object'),
      properties: z.record(z.string(), z.object({ schema: schemaNodeSchema, required: z.boolean() })),
    }),
    z.object({ kind: z.literal('union'), variants: z.array(schemaNodeSchema) }),
    z.object({ kind: z.literal('blob'), mimeType: z.string(), example: z.string().optional() }),
    z.object({ kind: z.literal('unknown') }),
  ])
);

const parameterModelSchema = z.object({
  schema: schemaNodeSchema,
  required: z.boolean(),
  example: z.union([z.string(), z.array(z.string())]).optional(),
});

const parameterMapSchema = z.record(z.string(), parameterModelSchema);

export const apiDefinitionSchema: z.ZodType<ApiDefinition> = z.object({
  key: z.string().min(1),
  method: z.string().min(1),
  pathTemplate: z.string().startsWith('/'),
  description: z.string(),
  hosts: z.array(z.string()),
  sampleCount: z.number().int().nonnegative(),
  observedStatuses: z.array(z.number().int()),
  request: z.object({
    pathParams: parameterMapSchema,
    headers: parameterMapSchema,
    queryParams: parameterMapSchema,
    bodySchema: schemaNodeSchema,
  }),
  response: z.object({
    statusCode: z.number().int(),
    headers: parameterMapSchema,
    bodySchema: schemaNodeSchema,
  }),
});

export const catalogueSchema = z.array(apiDefinitionSchema);

export type FilterRuleInput = z.input<typeof filterRuleInputSchema>;
export type FilterRulePatch = z.input<typeof filterRulePatchSchema>;
export type HostRuleInput = z.input<typeof hostRuleInputSchema>;
export type HostRulePatch = z.input<typeof hostRulePatchSchema>;

/**
 * Parse with a zod schema, raising ValidationError with flattened issues
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  what: string
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid ${what}`, issues);
  }
  return result.data;
}

/**
 * Compile a rule pattern, raising InvalidPatternError when it does not compile
 */
export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new InvalidPatternError(pattern, error instanceof Error ? error.message : String(error));
  }
}
