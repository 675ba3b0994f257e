/**
 * Storage Engine Interface
 *
 * Relational storage collaborator used by the table store. Engines own
 * connections, transactions and prepared-statement execution; statement
 * text is rendered through the engine's dialect.
 */

import type {
  ColumnDefinition,
  ColumnSchema,
  ExecuteResult,
  SqlParam,
} from '../types/index.js';

/**
 * SQL rendering rules for one database family
 */
export interface SqlDialect {
  /** Dialect name (mysql, postgresql) */
  readonly name: string;
  /** Whether INSERT ... RETURNING is available */
  readonly supportsReturning: boolean;

  /** Quote a validated identifier */
  quoteIdentifier(name: string): string;

  /** Quoted table reference, schema-qualified where the dialect carries one */
  tableName(table: string): string;

  /** Placeholder for the 1-based parameter index */
  placeholder(index: number): string;

  /** Column type and constraints, without the column name */
  columnType(column: ColumnDefinition): string;

  /** Full CREATE TABLE statement */
  createTableSql(table: string, schema: ColumnSchema): string;

  /**
   * INSERT statement for one row with placeholders 1..n; `returning` names
   * a column to report back where the dialect supports it
   */
  insertSql(table: string, columns: readonly string[], returning?: string): string;

  /** LIMIT/OFFSET suffix (empty string when neither is set) */
  paginate(limit?: number, offset?: number): string;
}

/**
 * Executes prepared statements (a pool, or a connection inside a transaction)
 */
export interface StatementExecutor {
  /**
   * Run one statement with bound parameters
   * @throws ConnectorError on driver failure
   */
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
}

export interface StorageEngine extends StatementExecutor {
  readonly dialect: SqlDialect;

  /**
   * Open the pool and verify connectivity
   * @throws ConnectorError if connection fails
   */
  connect(): Promise<void>;

  /**
   * Close all connections
   */
  disconnect(): Promise<void>;

  tableExists(table: string): Promise<boolean>;

  /**
   * Create a table from a column schema
   * @returns true once the statement succeeded
   */
  createTable(table: string, schema: ColumnSchema): Promise<boolean>;

  /**
   * Run work on one connection inside BEGIN/COMMIT; any rejection rolls the
   * whole transaction back and is rethrown
   */
  transaction<T>(work: (executor: StatementExecutor) => Promise<T>): Promise<T>;
}
