export {
  mappingOptionsSchema,
  mappingEntrySchema,
  fieldMappingSchema,
  resolveMappingOptions,
  parseFieldMapping,
} from './schemas.js';
