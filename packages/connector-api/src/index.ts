/**
 * @schemabridge/connector-api
 *
 * Fetches JSON payloads from web APIs and imports mapped records into
 * content stores.
 */

export * from './http/index.js';
export * from './importer/index.js';
