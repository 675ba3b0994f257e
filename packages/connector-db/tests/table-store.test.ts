import { describe, expect, it, vi } from 'vitest';
import type {
  ColumnSchema,
  ExecuteResult,
  SqlDialect,
  SqlParam,
  StatementExecutor,
  StorageEngine,
  StoredRow,
} from '@schemabridge/core';
import { ConnectorError, Logger, encodeValue, formatColumn } from '@schemabridge/core';
import { MappingError } from '@schemabridge/mapping';
import { TableStore } from '../src/store/table-store.js';
import { mysqlDialect } from '../src/mysql/dialect.js';
import { createPostgresDialect, postgresDialect } from '../src/postgresql/dialect.js';

class FakeEngine implements StorageEngine {
  readonly statements: { sql: string; params: SqlParam[] }[] = [];
  readonly tables = new Set<string>();
  readonly created: { table: string; schema: ColumnSchema }[] = [];
  rows: StoredRow[] = [];
  affectedRows = 0;
  committed = 0;
  rolledBack = 0;
  failWhen?: (sql: string, params: SqlParam[]) => boolean;
  failTableExists = false;
  private nextId = 1;

  constructor(readonly dialect: SqlDialect) {}

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async tableExists(table: string): Promise<boolean> {
    if (this.failTableExists) {
      throw new ConnectorError({ code: 'READ_FAILED', message: 'connection reset' });
    }
    return this.tables.has(table);
  }

  async createTable(table: string, schema: ColumnSchema): Promise<boolean> {
    this.created.push({ table, schema });
    this.tables.add(table);
    return true;
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    this.statements.push({ sql, params });
    if (this.failWhen?.(sql, params)) {
      throw new ConnectorError({ code: 'WRITE_FAILED', message: 'disk full' });
    }
    if (sql.startsWith('INSERT')) {
      const id = this.nextId++;
      return sql.includes('RETURNING')
        ? { rows: [{ id }], affectedRows: 1 }
        : { rows: [], affectedRows: 1, lastInsertId: id };
    }
    return { rows: this.rows, affectedRows: this.affectedRows };
  }

  async transaction<T>(work: (executor: StatementExecutor) => Promise<T>): Promise<T> {
    try {
      const result = await work(this);
      this.committed++;
      return result;
    } catch (error) {
      this.rolledBack++;
      throw error;
    }
  }
}

function setup(dialect: SqlDialect = mysqlDialect, options: ConstructorParameters<typeof TableStore>[1] = {}) {
  const engine = new FakeEngine(dialect);
  const logger = new Logger({ level: 'error' });
  const store = new TableStore(engine, { logger, ...options });
  return { engine, logger, store };
}

describe('TableStore', () => {
  describe('insert', () => {
    it('creates the table from the first record and returns the insert id', async () => {
      const { engine, store } = setup();

      const id = await store.insert('products', { name: 'Widget', price: 9.99, tags: ['a', 'b'] });

      expect(id).toBe(1);
      expect(engine.created).toHaveLength(1);
      expect(engine.created[0]!.schema.map(formatColumn)).toEqual([
        'id INTEGER PRIMARY KEY AUTO_INCREMENT',
        'name VARCHAR(255)',
        'price DECIMAL(10,2)',
        'tags LONG_TEXT',
      ]);
      expect(engine.statements).toEqual([
        {
          sql: 'INSERT INTO `products` (`name`, `price`, `tags`) VALUES (?, ?, ?)',
          params: ['Widget', 9.99, encodeValue(['a', 'b'])],
        },
      ]);
    });

    it('checks for a missing table once before creating it', async () => {
      const { engine, store } = setup();
      const check = vi.spyOn(engine, 'tableExists');

      await store.insert('products', { name: 'Widget' });

      expect(check).toHaveBeenCalledTimes(1);
      expect(engine.created.map((entry) => entry.table)).toEqual(['products']);
    });

    it('qualifies table names with the PostgreSQL schema', async () => {
      const { engine, store } = setup(createPostgresDialect('analytics'));

      await store.insert('products', { name: 'Widget' });
      await store.update('products', { name: 'Gadget' }, { id: 1 });
      await store.delete('products', { id: 1 });

      expect(engine.statements.map((statement) => statement.sql)).toEqual([
        'INSERT INTO "analytics"."products" ("name") VALUES ($1) RETURNING "id"',
        'UPDATE "analytics"."products" SET "name" = $1 WHERE "id" = $2',
        'DELETE FROM "analytics"."products" WHERE "id" = $1',
      ]);
    });

    it('does not rebuild an existing table', async () => {
      const { engine, store } = setup();
      engine.tables.add('products');

      await store.insert('products', { name: 'Widget' });
      await store.insert('products', { name: 'Gadget' });

      expect(engine.created).toHaveLength(0);
    });

    it('reads generated keys through RETURNING', async () => {
      const { engine, store } = setup(postgresDialect);

      expect(await store.insert('products', { name: 'Widget' })).toBe(1);
      expect(engine.statements[0]).toEqual({
        sql: 'INSERT INTO "products" ("name") VALUES ($1) RETURNING "id"',
        params: ['Widget'],
      });
    });

    it('generates string keys client-side', async () => {
      const { engine, store } = setup(mysqlDialect, { primaryKey: 'uuid', primaryKeyType: 'VARCHAR' });

      const id = await store.insert('notes', { body: 'hello' });

      expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(engine.statements[0]?.sql).toBe('INSERT INTO `notes` (`body`, `uuid`) VALUES (?, ?)');
      expect(engine.statements[0]?.params).toEqual(['hello', id]);
    });

    it('returns a supplied key', async () => {
      const { engine, store } = setup();
      engine.tables.add('products');

      expect(await store.insert('products', { id: 40, name: 'Widget' })).toBe(40);
    });

    it('renders timestamps for DATETIME columns', async () => {
      const { engine, store } = setup();
      engine.tables.add('events');

      await store.insert('events', { at: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) });

      expect(engine.statements[0]?.params).toEqual(['2024-01-02 03:04:05']);
    });

    it('returns 0 and logs when the write fails', async () => {
      const { engine, logger, store } = setup();
      const error = vi.spyOn(logger, 'error');
      engine.tables.add('products');
      engine.failWhen = (sql) => sql.startsWith('INSERT');

      expect(await store.insert('products', { name: 'Widget' })).toBe(0);
      expect(error).toHaveBeenCalledWith('Storage operation failed', {
        operation: 'insert',
        table: 'products',
        error: 'disk full',
      });
    });

    it('surfaces schema conflicts', async () => {
      const { engine, store } = setup();

      await expect(store.insert('items', { id: 'abc', name: 'x' })).rejects.toBeInstanceOf(MappingError);
      expect(engine.statements).toHaveLength(0);
      expect(engine.created).toHaveLength(0);
    });

    it('rejects unsafe identifiers before touching storage', async () => {
      const { engine, store } = setup();

      await expect(store.insert('items; DROP TABLE users', { name: 'x' })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      });
      await expect(store.insert('items', { 'name`': 'x' })).rejects.toBeInstanceOf(ConnectorError);
      expect(engine.statements).toHaveLength(0);
    });

    it('skips creation when autoCreate is off', async () => {
      const { engine, store } = setup(mysqlDialect, { autoCreate: false });

      await store.insert('products', { name: 'Widget' });

      expect(engine.created).toHaveLength(0);
      expect(engine.statements).toHaveLength(1);
    });
  });

  describe('get', () => {
    it('decodes nested values and leaves other text alone', async () => {
      const { engine, store } = setup();
      engine.rows = [{ id: 1, tags: encodeValue(['a']), note: '#sbv1#not json', raw: 'a:1:{i:0;s:1:"x";}' }];

      const rows = await store.get('products', { id: 1 });

      expect(rows).toEqual([{ id: 1, tags: ['a'], note: '#sbv1#not json', raw: 'a:1:{i:0;s:1:"x";}' }]);
      expect(engine.statements).toEqual([{ sql: 'SELECT * FROM `products` WHERE `id` = ?', params: [1] }]);
    });

    it('renders shorthand membership and null checks', async () => {
      const { engine, store } = setup(postgresDialect);

      await store.get('tickets', { status: ['open', 'held'], owner: null });

      expect(engine.statements[0]).toEqual({
        sql: 'SELECT * FROM "tickets" WHERE "status" IN ($1, $2) AND "owner" IS NULL',
        params: ['open', 'held'],
      });
    });

    it('renders operator conditions with ordering and paging', async () => {
      const { engine, store } = setup(postgresDialect);

      await store.get(
        'products',
        [
          { field: 'price', op: 'gte', value: 5 },
          { field: 'name', op: 'contains', value: '50%_off' },
        ],
        { orderBy: [{ field: 'price', direction: 'desc' }], limit: 10, offset: 20 }
      );

      expect(engine.statements[0]).toEqual({
        sql: 'SELECT * FROM "products" WHERE "price" >= $1 AND "name" LIKE $2 ORDER BY "price" DESC LIMIT 10 OFFSET 20',
        params: [5, '%50\\%\\_off%'],
      });
    });

    it('adds a LIMIT for offset-only pages on MySQL', async () => {
      const { engine, store } = setup();

      await store.get('products', {}, { offset: 5 });

      expect(engine.statements[0]?.sql).toBe('SELECT * FROM `products` LIMIT 18446744073709551615 OFFSET 5');
    });

    it('matches nothing for an empty membership list', async () => {
      const { engine, store } = setup();

      await store.get('products', { id: [] });

      expect(engine.statements[0]?.sql).toBe('SELECT * FROM `products` WHERE 1 = 0');
    });

    it('returns [] when the read fails', async () => {
      const { engine, store } = setup();
      engine.failWhen = () => true;

      expect(await store.get('products')).toEqual([]);
    });

    it('rejects invalid conditions and options', async () => {
      const { engine, store } = setup();

      await expect(store.get('products', [{ field: 'id;DROP', op: 'eq', value: 1 }])).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      });
      await expect(store.get('products', {}, { limit: 0 })).rejects.toBeInstanceOf(ConnectorError);
      expect(engine.statements).toHaveLength(0);
    });
  });

  describe('update and delete', () => {
    it('updates with bound values', async () => {
      const { engine, store } = setup(postgresDialect);
      engine.affectedRows = 1;

      expect(await store.update('products', { name: 'x', meta: { a: 1 } }, { id: 3 })).toBe(1);
      expect(engine.statements[0]).toEqual({
        sql: 'UPDATE "products" SET "name" = $1, "meta" = $2 WHERE "id" = $3',
        params: ['x', encodeValue({ a: 1 }), 3],
      });
    });

    it('deletes matching rows', async () => {
      const { engine, store } = setup();
      engine.affectedRows = 2;

      expect(await store.delete('products', { id: [1, 2] })).toBe(2);
      expect(engine.statements[0]).toEqual({
        sql: 'DELETE FROM `products` WHERE `id` IN (?, ?)',
        params: [1, 2],
      });
    });

    it('refuses to touch every row', async () => {
      const { engine, logger, store } = setup();
      const warn = vi.spyOn(logger, 'warn');

      expect(await store.update('products', { name: 'x' }, {})).toBe(0);
      expect(await store.delete('products', [])).toBe(0);
      expect(warn).toHaveBeenCalledTimes(2);
      expect(engine.statements).toHaveLength(0);
    });

    it('returns 0 when the statement fails', async () => {
      const { engine, store } = setup();
      engine.failWhen = () => true;

      expect(await store.update('products', { name: 'x' }, { id: 1 })).toBe(0);
      expect(await store.delete('products', { id: 1 })).toBe(0);
    });
  });

  describe('batchInsert', () => {
    it('inserts every row in one transaction and reports each key', async () => {
      const { engine, store } = setup();
      engine.tables.add('products');

      const result = await store.batchInsert('products', [{ name: 'a' }, { name: 'b' }, { name: 'c' }]);

      expect(result).toEqual({ inserted: 3, ids: [1, 2, 3] });
      expect(engine.committed).toBe(1);
    });

    it('rolls back the whole batch on failure', async () => {
      const { engine, store } = setup();
      engine.tables.add('products');
      engine.failWhen = (_sql, params) => params.includes('b');

      const result = await store.batchInsert('products', [{ name: 'a' }, { name: 'b' }, { name: 'c' }]);

      expect(result).toEqual({ inserted: 0, ids: [] });
      expect(engine.rolledBack).toBe(1);
      expect(engine.committed).toBe(0);
      expect(engine.statements).toHaveLength(2);
    });

    it('creates the table from the first row', async () => {
      const { engine, store } = setup(postgresDialect);

      const result = await store.batchInsert('people', [{ name: 'Ada', age: 36 }]);

      expect(result).toEqual({ inserted: 1, ids: [1] });
      expect(engine.created[0]?.table).toBe('people');
    });

    it('does nothing for an empty batch', async () => {
      const { engine, store } = setup();

      expect(await store.batchInsert('products', [])).toEqual({ inserted: 0, ids: [] });
      expect(engine.statements).toHaveLength(0);
    });
  });

  describe('tableExists', () => {
    it('remembers tables it has seen', async () => {
      const { engine, store } = setup();
      engine.tables.add('products');
      const check = vi.spyOn(engine, 'tableExists');

      expect(await store.tableExists('products')).toBe(true);
      expect(await store.tableExists('products')).toBe(true);
      expect(check).toHaveBeenCalledTimes(1);
    });

    it('reports false when the check fails', async () => {
      const { engine, store } = setup();
      engine.failTableExists = true;

      expect(await store.tableExists('products')).toBe(false);
    });
  });
});
