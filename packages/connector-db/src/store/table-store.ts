/**
 * TableStore
 *
 * Generic CRUD over a storage engine. Tables are created on first write
 * from the shape of the written record, nested values are encoded on the
 * way in and decoded on the way out.
 *
 * Every public operation is a failure boundary: storage errors are logged
 * and turned into an empty result (false, 0, [] or an empty batch). Caller
 * errors (unsafe identifiers, invalid options, schema conflicts) are thrown.
 */

import { randomUUID } from 'node:crypto';
import type {
  BatchInsertResult,
  Conditions,
  DataRecord,
  PrimaryKeyType,
  QueryOptions,
  RowId,
  SqlParam,
  StatementExecutor,
  StorageEngine,
} from '@schemabridge/core';
import {
  ConnectorError,
  Logger,
  isConnectorError,
  errorMessage,
  hasField,
  prepareForStorage,
  queryOptionsSchema,
  restoreFromStorage,
  setField,
} from '@schemabridge/core';
import { MappingError, SchemaBuilder } from '@schemabridge/mapping';
import { StatementParams, assertIdentifier, assertIdentifiers, normalizeConditions, renderWhere } from '../sql/index.js';
import type { TableStoreOptions, TableStoreSettings, WriteOptions } from './options.js';
import { parseOptions, tableStoreOptionsSchema, writeOptionsSchema } from './options.js';

interface KeySettings {
  primaryKey: string;
  primaryKeyType: PrimaryKeyType;
}

function emptyBatch(): BatchInsertResult {
  return { inserted: 0, ids: [] };
}

function isCallerError(error: unknown): boolean {
  return error instanceof MappingError || (isConnectorError(error) && error.isCallerError);
}

export class TableStore {
  private readonly settings: TableStoreSettings;
  private readonly logger: Logger;
  private readonly schemaBuilder = new SchemaBuilder();
  private readonly knownTables = new Set<string>();

  constructor(
    private readonly engine: StorageEngine,
    options: TableStoreOptions = {}
  ) {
    const { logger, ...settings } = options;
    this.logger = logger ?? new Logger();
    this.settings = parseOptions(tableStoreOptionsSchema, settings, 'table store options');
  }

  async tableExists(table: string): Promise<boolean> {
    assertIdentifier(table, 'table');
    return this.boundary('tableExists', table, false, () => this.checkTable(table));
  }

  /**
   * Create `table` with columns inferred from `example`. Nothing is built
   * when the table already exists.
   *
   * @throws MappingError (SCHEMA_CONFLICT) when the example's key value does
   *   not fit the key type
   */
  async createTable(
    table: string,
    example: DataRecord,
    primaryKey: string = this.settings.primaryKey,
    primaryKeyType: PrimaryKeyType = this.settings.primaryKeyType
  ): Promise<boolean> {
    assertIdentifier(table, 'table');
    assertIdentifier(primaryKey, 'column');
    assertIdentifiers(Object.keys(example), 'column');

    return this.boundary('createTable', table, false, async () => {
      if (await this.checkTable(table)) return true;
      return this.buildTable(table, example, primaryKey, primaryKeyType);
    });
  }

  /**
   * Insert one record
   * @returns the row key, or 0 when the write failed
   */
  async insert(table: string, data: DataRecord, options: WriteOptions = {}): Promise<RowId> {
    const write = this.writeSettings(options);
    assertIdentifier(table, 'table');
    assertIdentifiers(Object.keys(data), 'column');

    return this.boundary('insert', table, 0, async () => {
      if (!(await this.ensureTable(table, data, write))) return 0;
      return this.insertRow(this.engine, table, data, write);
    });
  }

  /**
   * Read rows matching `conditions`, decoded back to nested values
   */
  async get(table: string, conditions: Conditions = {}, options: QueryOptions = {}): Promise<DataRecord[]> {
    assertIdentifier(table, 'table');
    const query = parseOptions(queryOptionsSchema, options, 'query options');
    const filters = normalizeConditions(conditions);

    return this.boundary('get', table, [], async () => {
      const params = new StatementParams(this.engine.dialect);
      const { dialect } = this.engine;

      let sql = `SELECT * FROM ${dialect.tableName(table)}`;
      sql += renderWhere(dialect, params, filters);

      if (query.orderBy?.length) {
        const order = query.orderBy.map(
          (entry) => `${dialect.quoteIdentifier(entry.field)} ${entry.direction.toUpperCase()}`
        );
        sql += ` ORDER BY ${order.join(', ')}`;
      }
      sql += dialect.paginate(query.limit, query.offset);

      const result = await this.engine.execute(sql, params.values);
      return result.rows.map(restoreFromStorage);
    });
  }

  /**
   * Update rows matching `conditions`
   * @returns affected rows, 0 on failure or when no conditions were given
   */
  async update(table: string, data: DataRecord, conditions: Conditions): Promise<number> {
    assertIdentifier(table, 'table');
    assertIdentifiers(Object.keys(data), 'column');
    const filters = normalizeConditions(conditions);

    if (filters.length === 0) {
      this.logger.warn('Refusing to update without conditions', { table });
      return 0;
    }
    const prepared = Object.entries(prepareForStorage(data));
    if (prepared.length === 0) return 0;

    return this.boundary('update', table, 0, async () => {
      const { dialect } = this.engine;
      const params = new StatementParams(dialect);
      const assignments = prepared.map(
        ([column, value]) => `${dialect.quoteIdentifier(column)} = ${params.add(value)}`
      );
      const sql =
        `UPDATE ${dialect.tableName(table)} SET ${assignments.join(', ')}` +
        renderWhere(dialect, params, filters);

      const result = await this.engine.execute(sql, params.values);
      return result.affectedRows;
    });
  }

  /**
   * Delete rows matching `conditions`
   * @returns affected rows, 0 on failure or when no conditions were given
   */
  async delete(table: string, conditions: Conditions): Promise<number> {
    assertIdentifier(table, 'table');
    const filters = normalizeConditions(conditions);

    if (filters.length === 0) {
      this.logger.warn('Refusing to delete without conditions', { table });
      return 0;
    }

    return this.boundary('delete', table, 0, async () => {
      const { dialect } = this.engine;
      const params = new StatementParams(dialect);
      const sql = `DELETE FROM ${dialect.tableName(table)}${renderWhere(dialect, params, filters)}`;

      const result = await this.engine.execute(sql, params.values);
      return result.affectedRows;
    });
  }

  /**
   * Insert all rows in one transaction. Any failure rolls the whole batch
   * back and reports nothing inserted.
   */
  async batchInsert(table: string, rows: readonly DataRecord[], options: WriteOptions = {}): Promise<BatchInsertResult> {
    const write = this.writeSettings(options);
    assertIdentifier(table, 'table');
    for (const row of rows) {
      assertIdentifiers(Object.keys(row), 'column');
    }

    const [first] = rows;
    if (first === undefined) return emptyBatch();

    return this.boundary('batchInsert', table, emptyBatch(), async () => {
      if (!(await this.ensureTable(table, first, write))) return emptyBatch();

      const ids = await this.engine.transaction(async (executor) => {
        const inserted: RowId[] = [];
        for (const row of rows) {
          inserted.push(await this.insertRow(executor, table, row, write));
        }
        return inserted;
      });

      return { inserted: ids.length, ids };
    });
  }

  private writeSettings(options: WriteOptions): TableStoreSettings {
    const overrides = parseOptions(writeOptionsSchema, options, 'write options');
    return {
      primaryKey: overrides.primaryKey ?? this.settings.primaryKey,
      primaryKeyType: overrides.primaryKeyType ?? this.settings.primaryKeyType,
      autoCreate: overrides.autoCreate ?? this.settings.autoCreate,
    };
  }

  private async checkTable(table: string): Promise<boolean> {
    if (this.knownTables.has(table)) return true;
    const exists = await this.engine.tableExists(table);
    if (exists) this.knownTables.add(table);
    return exists;
  }

  private async ensureTable(table: string, example: DataRecord, write: TableStoreSettings): Promise<boolean> {
    if (!write.autoCreate) return true;
    if (await this.checkTable(table)) return true;
    return this.buildTable(table, example, write.primaryKey, write.primaryKeyType);
  }

  private async buildTable(
    table: string,
    example: DataRecord,
    primaryKey: string,
    primaryKeyType: PrimaryKeyType
  ): Promise<boolean> {
    const schema = this.schemaBuilder.build(example, primaryKey, primaryKeyType);
    const created = await this.engine.createTable(table, schema);
    if (created) {
      this.knownTables.add(table);
      this.logger.info('Created table', { table, columns: schema.length });
    }
    return created;
  }

  private async insertRow(
    executor: StatementExecutor,
    table: string,
    data: DataRecord,
    keys: KeySettings
  ): Promise<RowId> {
    const { dialect } = this.engine;
    const row: Record<string, SqlParam> = prepareForStorage(data);
    if (!hasField(row, keys.primaryKey) && keys.primaryKeyType === 'VARCHAR') {
      setField<SqlParam>(row, keys.primaryKey, randomUUID());
    }

    const columns = Object.keys(row);
    const params = new StatementParams(dialect);
    for (const column of columns) {
      params.add(row[column] ?? null);
    }

    const sql = dialect.insertSql(table, columns, dialect.supportsReturning ? keys.primaryKey : undefined);
    const result = await executor.execute(sql, params.values);

    const returned = result.rows[0]?.[keys.primaryKey];
    if (typeof returned === 'number' || typeof returned === 'string') return returned;

    const supplied = row[keys.primaryKey];
    if (typeof supplied === 'number' || typeof supplied === 'string') return supplied;

    if (result.lastInsertId !== undefined) return result.lastInsertId;

    throw new ConnectorError({
      code: 'WRITE_FAILED',
      message: `Insert into "${table}" did not report a key for "${keys.primaryKey}"`,
    });
  }

  private async boundary<T>(operation: string, table: string, fallback: T, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (isCallerError(error)) throw error;
      this.logger.error('Storage operation failed', { operation, table, error: errorMessage(error) });
      return fallback;
    }
  }
}
