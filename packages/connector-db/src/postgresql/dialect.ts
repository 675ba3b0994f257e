/**
 * PostgreSQL dialect
 */

import type { ColumnDefinition, ColumnSchema, SqlDialect, StorageType } from '@schemabridge/core';

const COLUMN_TYPES: Record<StorageType, string> = {
  INTEGER: 'INTEGER',
  DECIMAL: 'NUMERIC(10,2)',
  BOOLEAN: 'BOOLEAN',
  VARCHAR: 'VARCHAR(255)',
  LONG_TEXT: 'TEXT',
  DATETIME: 'TIMESTAMPTZ',
  IMAGE: 'TEXT',
  GALLERY: 'TEXT',
};

/**
 * Dialect whose table references are qualified with `schemaName`; without one,
 * tables resolve through the session's search_path.
 */
export function createPostgresDialect(schemaName?: string): SqlDialect {
  return {
    name: 'postgresql',
    supportsReturning: true,

    quoteIdentifier(name: string): string {
      return `"${name}"`;
    },

    tableName(table: string): string {
      const quoted = this.quoteIdentifier(table);
      return schemaName === undefined ? quoted : `${this.quoteIdentifier(schemaName)}.${quoted}`;
    },

    placeholder(index: number): string {
      return `$${index}`;
    },

    columnType(column: ColumnDefinition): string {
      const type = COLUMN_TYPES[column.type];
      if (!column.primaryKey) return type;
      if (column.autoGenerated && column.type === 'INTEGER') {
        return `${type} GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY`;
      }
      return `${type} PRIMARY KEY`;
    },

    createTableSql(table: string, schema: ColumnSchema): string {
      const columns = schema.map((column) => `${this.quoteIdentifier(column.name)} ${this.columnType(column)}`);
      return `CREATE TABLE IF NOT EXISTS ${this.tableName(table)} (${columns.join(', ')})`;
    },

    insertSql(table: string, columns: readonly string[], returning?: string): string {
      const target = this.tableName(table);
      const values =
        columns.length === 0
          ? 'DEFAULT VALUES'
          : `(${columns.map((column) => this.quoteIdentifier(column)).join(', ')}) ` +
            `VALUES (${columns.map((_, index) => this.placeholder(index + 1)).join(', ')})`;
      const suffix = returning === undefined ? '' : ` RETURNING ${this.quoteIdentifier(returning)}`;
      return `INSERT INTO ${target} ${values}${suffix}`;
    },

    paginate(limit?: number, offset?: number): string {
      let clause = '';
      if (limit !== undefined) clause += ` LIMIT ${limit}`;
      if (offset !== undefined) clause += ` OFFSET ${offset}`;
      return clause;
    },
  };
}

export const postgresDialect = createPostgresDialect();

