/**
 * Error exports for mapping
 */

export { MappingError, FieldFailure, isFieldFailure } from './mapping-error.js';
export type { MappingErrorCode, MappingErrorDetails } from './mapping-error.js';
