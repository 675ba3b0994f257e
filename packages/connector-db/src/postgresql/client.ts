/**
 * PostgreSQL Client
 *
 * Storage engine over a pg pool. Sessions run with the time zone pinned to
 * UTC so TIMESTAMPTZ columns exchange the same instants that were written.
 */

import pg from 'pg';
import type {
  ColumnSchema,
  ExecuteResult,
  SqlDialect,
  SqlParam,
  StatementExecutor,
  StorageEngine,
  StoredRow,
} from '@schemabridge/core';
import { ConnectorError, Logger, errorMessage, wrapError } from '@schemabridge/core';
import { assertIdentifier, assertIdentifiers } from '../sql/index.js';
import { createPostgresDialect } from './dialect.js';

const { Pool } = pg;

export interface PostgresClientConfig {
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** Schema that holds the tables (default: the session's search_path) */
  schema?: string;
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  max?: number;
  /** Milliseconds to wait for a new connection */
  connectionTimeoutMillis?: number;
}

interface Queryable {
  query(sql: string, params?: SqlParam[]): Promise<pg.QueryResult>;
}

function toStoredRows(rows: readonly unknown[]): StoredRow[] {
  return rows.filter(
    (row): row is StoredRow => typeof row === 'object' && row !== null && !Array.isArray(row)
  );
}

/** pg hands NUMERIC cells back as text */
const NUMERIC_OID = 1700;

function decodeNumerics(rows: StoredRow[], fields: readonly pg.FieldDef[] = []): StoredRow[] {
  const numeric = fields.filter((field) => field.dataTypeID === NUMERIC_OID).map((field) => field.name);
  if (numeric.length === 0) return rows;

  return rows.map((row) => {
    const decoded: StoredRow = { ...row };
    for (const name of numeric) {
      const cell = decoded[name];
      if (typeof cell === 'string') decoded[name] = Number(cell);
    }
    return decoded;
  });
}

function isReadStatement(sql: string): boolean {
  return /^\s*(SELECT|WITH)\b/i.test(sql);
}

export class PostgresClient implements StorageEngine {
  readonly dialect: SqlDialect;
  private readonly pool: pg.Pool;
  private readonly schema?: string;
  private readonly logger: Logger;

  constructor(config: PostgresClientConfig, logger: Logger = new Logger()) {
    if (config.schema !== undefined) assertIdentifier(config.schema, 'schema');
    this.logger = logger;
    this.schema = config.schema;
    this.dialect = createPostgresDialect(config.schema);
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 10,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 10_000,
      options: '-c TimeZone=UTC',
    });
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `PostgreSQL connection failed: ${errorMessage(error)}`,
        suggestion: 'Check host, port, database, user, and password.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    return this.run(this.pool, sql, params);
  }

  async tableExists(table: string): Promise<boolean> {
    assertIdentifier(table, 'table');
    const result = await this.execute(
      `SELECT EXISTS (
         SELECT 1 FROM information_schema.tables
         WHERE table_schema = COALESCE($1::text, current_schema()) AND table_name = $2
       ) AS table_exists`,
      [this.schema ?? null, table]
    );
    return result.rows[0]?.['table_exists'] === true;
  }

  async createTable(table: string, schema: ColumnSchema): Promise<boolean> {
    assertIdentifier(table, 'table');
    assertIdentifiers(
      schema.map((column) => column.name),
      'column'
    );
    await this.execute(this.dialect.createTableSql(table, schema));
    return true;
  }

  async transaction<T>(work: (executor: StatementExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect().catch((error: unknown) => {
      throw wrapError(error, 'CONNECTION_FAILED');
    });

    const executor: StatementExecutor = {
      execute: (sql, params = []) => this.run(client, sql, params),
    };

    try {
      await client.query('BEGIN');
      const result = await work(executor);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.warn('PostgreSQL rollback failed', { error: errorMessage(rollbackError) });
      }
      throw wrapError(error, 'WRITE_FAILED');
    } finally {
      client.release();
    }
  }

  private async run(target: Queryable, sql: string, params: SqlParam[]): Promise<ExecuteResult> {
    try {
      const result = await target.query(sql, params);
      return {
        rows: decodeNumerics(toStoredRows(result.rows), result.fields),
        affectedRows: result.rowCount ?? 0,
      };
    } catch (error) {
      throw new ConnectorError({
        code: isReadStatement(sql) ? 'READ_FAILED' : 'WRITE_FAILED',
        message: `Query failed: ${errorMessage(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}
