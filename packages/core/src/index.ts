/**
 * @schemabridge/core
 *
 * Value model, schema and storage types, collaborator interfaces and the
 * storage value codec shared by all schemabridge packages
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Storage value codec
export * from './codec/index.js';

// Logging
export * from './logging/index.js';

// Utilities
export * from './utils/index.js';
