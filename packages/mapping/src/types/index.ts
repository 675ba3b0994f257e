/**
 * Type exports for mapping
 */

export type {
  FilterName,
  FilterFn,
  ValueFilter,
  MediaKind,
  Locator,
  FieldSource,
  RepeaterSpec,
  MappingEntry,
  FieldMapping,
  MappingOptions,
  ResolvedMappingOptions,
  TransformedValue,
  TransformedRecord,
} from './field-mapping.js';
export {
  TITLE_TARGET,
  CONTENT_TARGET,
  RESERVED_TARGETS,
  isRepeaterSpec,
} from './field-mapping.js';
