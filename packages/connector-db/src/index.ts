/**
 * @schemabridge/connector-db
 *
 * Relational storage for transformed records: MySQL and PostgreSQL engines
 * and a TableStore that creates tables from example records.
 */

export { MySQLClient, mysqlDialect } from './mysql/index.js';
export type { MySQLClientConfig } from './mysql/index.js';

export { PostgresClient, createPostgresDialect, postgresDialect } from './postgresql/index.js';
export type { PostgresClientConfig } from './postgresql/index.js';

export { TableStore, tableStoreOptionsSchema, writeOptionsSchema } from './store/index.js';
export type { TableStoreOptions, TableStoreSettings, WriteOptions } from './store/index.js';

export { assertIdentifier, normalizeConditions } from './sql/index.js';
