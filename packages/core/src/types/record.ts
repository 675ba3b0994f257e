/**
 * Result types for storage operations
 */

/** Row as returned by a database driver, before decoding */
export type StoredRow = { [column: string]: unknown };

/** Values bound to prepared statement placeholders */
export type SqlParam = string | number | boolean | Date | null;

/** Identity of a stored row */
export type RowId = number | string;

export interface ExecuteResult {
  rows: StoredRow[];
  /** Rows changed by INSERT/UPDATE/DELETE */
  affectedRows: number;
  /** Generated key of the last inserted row (if the engine reports one) */
  lastInsertId?: RowId;
}

export interface BatchInsertResult {
  /** Number of rows written (0 when the batch was rolled back) */
  inserted: number;
  /** Keys of the written rows, in input order */
  ids: RowId[];
}
