export {
  ABSENT,
  UNKNOWN,
  MAX_UNION_VARIANTS,
  inferSchema,
  inferScalar,
  detectFormat,
  joinSchemas,
  joinProperties,
  findWidenings,
  describeSchema,
  type SchemaWidening,
} from './schema-inferrer.js';
export {
  looksLikeId,
  placeholderName,
  splitPath,
  templatePaths,
  type PathSample,
  type TemplatedPath,
} from './path-template.js';
export {
  ModelBuilder,
  DEFAULT_IGNORED_HEADERS,
  DEFAULT_VARIANCE_THRESHOLD,
  bodySchema,
  collectConflicts,
  definitionKey,
  joinParameters,
  mergeCatalogues,
  mergeDefinitions,
  summarizeDefinition,
  type BuildOptions,
  type BuildResult,
  type BuildStats,
  type HostStats,
  type ModelBuilderOptions,
} from './model-builder.js';
export { checkConformance } from './conformance.js';
export {
  TestSynthesizer,
  exampleValue,
  testCaseId,
  type SynthesizeOptions,
} from './test-synthesizer.js';
export {
  renderMarkdown,
  renderOpenApi,
  toOpenApiSchema,
  type OpenApiDocument,
  type OpenApiOperation,
  type OpenApiParameter,
  type OpenApiSchema,
  type RenderOptions,
} from './doc-renderer.js';
