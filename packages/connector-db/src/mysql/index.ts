/**
 * MySQL storage
 */

export { MySQLClient } from './client.js';
export type { MySQLClientConfig } from './client.js';
export { mysqlDialect } from './dialect.js';
