/**
 * @schemabridge/mapping
 *
 * Schema inference and field mapping for nested API payloads.
 * Infers column schemas, generates field mappings from example records and
 * transforms payloads into flat records ready for storage.
 */

// Types
export * from './types/index.js';

// Inference
export {
  inferStorageType,
  inferFieldKind,
  textLength,
  IMAGE_EXTENSIONS,
  isImageLocator,
  isImageRecord,
  isImageArray,
} from './inference/index.js';

// Schema
export { SchemaBuilder } from './schema/index.js';

// Mapping
export {
  MappingGenerator,
  RecordTransformer,
  splitFailures,
  BUILT_IN_FILTERS,
  isFilterName,
  toInt,
  toFloat,
  toBool,
  toText,
  toDateTime,
  resolvePath,
  locatorPath,
} from './mapping/index.js';
export type {
  MappingGeneratorOptions,
  RecordTransformerOptions,
  SplitRecord,
} from './mapping/index.js';

// Content fields
export { buildFieldDefinition, fieldKey, MEDIA_MIME_TYPES } from './fields/index.js';

// Validation
export {
  mappingOptionsSchema,
  mappingEntrySchema,
  fieldMappingSchema,
  resolveMappingOptions,
  parseFieldMapping,
} from './validation/index.js';

// Errors
export { MappingError, FieldFailure, isFieldFailure } from './errors/index.js';
export type { MappingErrorCode, MappingErrorDetails } from './errors/index.js';
