export { MappingGenerator } from './mapping-generator.js';
export type { MappingGeneratorOptions } from './mapping-generator.js';
export { RecordTransformer, splitFailures } from './record-transformer.js';
export type { RecordTransformerOptions, SplitRecord } from './record-transformer.js';
export { BUILT_IN_FILTERS, isFilterName, toInt, toFloat, toBool, toText, toDateTime } from './filters.js';
export { resolvePath, locatorPath } from './path-resolver.js';
