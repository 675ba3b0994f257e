/**
 * PostgreSQL storage
 */

export { PostgresClient } from './client.js';
export type { PostgresClientConfig } from './client.js';
export { createPostgresDialect, postgresDialect } from './dialect.js';
