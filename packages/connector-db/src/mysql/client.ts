/**
 * MySQL Client
 *
 * Storage engine over a mysql2/promise pool. DECIMAL columns are read back
 * as numbers and DATETIME values are exchanged in UTC.
 */

import mysql from 'mysql2/promise';
import type {
  ColumnSchema,
  ExecuteResult,
  SqlParam,
  StatementExecutor,
  StorageEngine,
  StoredRow,
} from '@schemabridge/core';
import { ConnectorError, Logger, errorMessage, wrapError } from '@schemabridge/core';
import { assertIdentifier, assertIdentifiers } from '../sql/index.js';
import { mysqlDialect } from './dialect.js';

export interface MySQLClientConfig {
  /** Connection string (alternative to individual params) */
  uri?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean;
  /** Connection pool size */
  connectionLimit?: number;
  /** Milliseconds to wait for a new connection */
  connectTimeout?: number;
}

type MySQLResult = [mysql.ResultSetHeader | mysql.RowDataPacket[], mysql.FieldPacket[]];

function toStoredRows(rows: readonly unknown[]): StoredRow[] {
  return rows.filter(
    (row): row is StoredRow => typeof row === 'object' && row !== null && !Array.isArray(row)
  );
}

function isReadStatement(sql: string): boolean {
  return /^\s*(SELECT|SHOW|WITH)\b/i.test(sql);
}

export class MySQLClient implements StorageEngine {
  readonly dialect = mysqlDialect;
  private readonly pool: mysql.Pool;
  private readonly logger: Logger;

  constructor(config: MySQLClientConfig, logger: Logger = new Logger()) {
    this.logger = logger;
    this.pool = mysql.createPool({
      uri: config.uri,
      host: config.host,
      port: config.port ?? 3306,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? {} : undefined,
      connectionLimit: config.connectionLimit ?? 10,
      connectTimeout: config.connectTimeout ?? 10_000,
      waitForConnections: true,
      decimalNumbers: true,
      timezone: 'Z',
    });
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const connection = await this.pool.getConnection();
      connection.release();
    } catch (error) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `MySQL connection failed: ${errorMessage(error)}`,
        suggestion: 'Check host, port, database, user, and password.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    return this.run(sql, () => this.pool.execute<mysql.ResultSetHeader | mysql.RowDataPacket[]>(sql, params));
  }

  async tableExists(table: string): Promise<boolean> {
    assertIdentifier(table, 'table');
    const result = await this.execute(
      `SELECT COUNT(*) AS table_count FROM INFORMATION_SCHEMA.TABLES
       WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ?`,
      [table]
    );
    return Number(result.rows[0]?.['table_count'] ?? 0) > 0;
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
    const connection = await this.pool.getConnection().catch((error: unknown) => {
      throw wrapError(error, 'CONNECTION_FAILED');
    });

    const executor: StatementExecutor = {
      execute: (sql, params = []) =>
        this.run(sql, () => connection.execute<mysql.ResultSetHeader | mysql.RowDataPacket[]>(sql, params)),
    };

    try {
      await connection.beginTransaction();
      const result = await work(executor);
      await connection.commit();
      return result;
    } catch (error) {
      try {
        await connection.rollback();
      } catch (rollbackError) {
        this.logger.warn('MySQL rollback failed', { error: errorMessage(rollbackError) });
      }
      throw wrapError(error, 'WRITE_FAILED');
    } finally {
      connection.release();
    }
  }

  private async run(sql: string, statement: () => Promise<MySQLResult>): Promise<ExecuteResult> {
    try {
      const [rows] = await statement();

      if (Array.isArray(rows)) {
        return { rows: toStoredRows(rows), affectedRows: 0 };
      }

      return {
        rows: [],
        affectedRows: rows.affectedRows,
        lastInsertId: rows.insertId > 0 ? rows.insertId : undefined,
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
