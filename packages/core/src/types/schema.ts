/**
 * Schema types for inferred storage columns and content fields
 */

/** Inferred column storage type */
export type StorageType =
  | 'INTEGER'
  | 'DECIMAL'
  | 'BOOLEAN'
  | 'VARCHAR'
  | 'LONG_TEXT'
  | 'DATETIME'
  | 'IMAGE'
  | 'GALLERY';

/** Types a primary key column may take */
export type PrimaryKeyType = 'INTEGER' | 'VARCHAR';

export interface ColumnDefinition {
  name: string;
  type: StorageType;
  primaryKey: boolean;
  /** Value supplied by the storage layer (auto increment or generated UUID) */
  autoGenerated: boolean;
}

/** Ordered column list; exactly one column is the primary key */
export type ColumnSchema = readonly ColumnDefinition[];

/** Field kinds used when declaring fields in a content system */
export type FieldKind =
  | 'integer'
  | 'decimal'
  | 'boolean'
  | 'text'
  | 'long_text'
  | 'timestamp'
  | 'image'
  | 'url'
  | 'repeater'
  | 'gallery'
  | 'collection';

export interface ContentFieldDefinition {
  /** Stable key, derived from target type and field name */
  key: string;
  /** Human-readable label */
  label: string;
  name: string;
  kind: FieldKind;
  /** Row fields, for repeaters */
  subFields?: ContentFieldDefinition[];
  /** For image and gallery fields */
  returnFormat?: 'array';
  mimeTypes?: string[];
}

const STORAGE_TYPE_LABELS: Record<StorageType, string> = {
  INTEGER: 'INTEGER',
  DECIMAL: 'DECIMAL(10,2)',
  BOOLEAN: 'BOOLEAN',
  VARCHAR: 'VARCHAR(255)',
  LONG_TEXT: 'LONG_TEXT',
  DATETIME: 'DATETIME',
  IMAGE: 'IMAGE',
  GALLERY: 'GALLERY',
};

/** Maximum length (code points) stored as VARCHAR */
export const VARCHAR_LENGTH = 255;

export function formatStorageType(type: StorageType): string {
  return STORAGE_TYPE_LABELS[type];
}

/**
 * Render a column as `name TYPE[ PRIMARY KEY][ AUTO_INCREMENT]`
 */
export function formatColumn(column: ColumnDefinition): string {
  const parts = [column.name, formatStorageType(column.type)];
  if (column.primaryKey) parts.push('PRIMARY KEY');
  if (column.primaryKey && column.autoGenerated && column.type === 'INTEGER') {
    parts.push('AUTO_INCREMENT');
  }
  return parts.join(' ');
}

export function findPrimaryKey(schema: ColumnSchema): ColumnDefinition | undefined {
  return schema.find((column) => column.primaryKey);
}
