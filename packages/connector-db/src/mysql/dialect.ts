/**
 * MySQL dialect
 */

import type { ColumnDefinition, ColumnSchema, SqlDialect, StorageType } from '@schemabridge/core';

const COLUMN_TYPES: Record<StorageType, string> = {
  INTEGER: 'INT',
  DECIMAL: 'DECIMAL(10,2)',
  BOOLEAN: 'TINYINT(1)',
  VARCHAR: 'VARCHAR(255)',
  LONG_TEXT: 'LONGTEXT',
  DATETIME: 'DATETIME',
  IMAGE: 'LONGTEXT',
  GALLERY: 'LONGTEXT',
};

/** Largest LIMIT MySQL accepts; required when only OFFSET is given */
const MAX_LIMIT = '18446744073709551615';

export const mysqlDialect: SqlDialect = {
  name: 'mysql',
  supportsReturning: false,

  quoteIdentifier(name: string): string {
    return `\`${name}\``;
  },

  tableName(table: string): string {
    return this.quoteIdentifier(table);
  },

  placeholder(): string {
    return '?';
  },

  columnType(column: ColumnDefinition): string {
    const type = COLUMN_TYPES[column.type];
    if (!column.primaryKey) return type;
    if (column.autoGenerated && column.type === 'INTEGER') {
      return `${type} NOT NULL AUTO_INCREMENT PRIMARY KEY`;
    }
    return `${type} NOT NULL PRIMARY KEY`;
  },

  createTableSql(table: string, schema: ColumnSchema): string {
    const columns = schema.map((column) => `${this.quoteIdentifier(column.name)} ${this.columnType(column)}`);
    return (
      `CREATE TABLE IF NOT EXISTS ${this.tableName(table)} (${columns.join(', ')}) ` +
      'ENGINE=InnoDB DEFAULT CHARSET=utf8mb4'
    );
  },

  insertSql(table: string, columns: readonly string[]): string {
    const names = columns.map((column) => this.quoteIdentifier(column)).join(', ');
    const placeholders = columns.map(() => '?').join(', ');
    return `INSERT INTO ${this.tableName(table)} (${names}) VALUES (${placeholders})`;
  },

  paginate(limit?: number, offset?: number): string {
    if (limit === undefined && offset === undefined) return '';
    const limitPart = ` LIMIT ${limit ?? MAX_LIMIT}`;
    return offset === undefined ? limitPart : `${limitPart} OFFSET ${offset}`;
  },
};
