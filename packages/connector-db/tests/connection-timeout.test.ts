import { describe, expect, it, vi } from 'vitest';
import { ConnectorError, Logger } from '@schemabridge/core';

vi.mock('pg', () => {
  class MockPool {
    connect = vi.fn(async () => {
      throw new Error('timeout expired');
    });
    query = vi.fn(async () => ({ rows: [], rowCount: 0 }));
    end = vi.fn(async () => {});
  }
  return { default: { Pool: MockPool }, Pool: MockPool };
});

vi.mock('mysql2/promise', () => {
  class MockPool {
    execute = vi.fn(async () => [[], []]);
    getConnection = vi.fn(async () => {
      throw new Error('connect ETIMEDOUT');
    });
    end = vi.fn(async () => {});
  }
  return { default: { createPool: () => new MockPool() } };
});

import { PostgresClient } from '../src/postgresql/client.js';
import { MySQLClient } from '../src/mysql/client.js';
import { TableStore } from '../src/store/table-store.js';

const logger = new Logger({ level: 'error' });

describe('Database connection error handling', () => {
  it('wraps PostgreSQL connection timeouts in ConnectorError', async () => {
    const client = new PostgresClient({ connectionTimeoutMillis: 50 }, logger);

    await expect(client.connect()).rejects.toBeInstanceOf(ConnectorError);
    await expect(client.connect()).rejects.toMatchObject({
      code: 'CONNECTION_FAILED',
      message: 'PostgreSQL connection failed: timeout expired',
    });
  });

  it('wraps MySQL connection timeouts in ConnectorError', async () => {
    const client = new MySQLClient({ connectTimeout: 50 }, logger);

    await expect(client.connect()).rejects.toMatchObject({
      code: 'CONNECTION_FAILED',
      message: 'MySQL connection failed: connect ETIMEDOUT',
    });
  });

  it('reports an empty batch when no transaction connection is available', async () => {
    const store = new TableStore(new MySQLClient({}, logger), { logger, autoCreate: false });

    expect(await store.batchInsert('orders', [{ total: 1 }])).toEqual({ inserted: 0, ids: [] });
  });
});
