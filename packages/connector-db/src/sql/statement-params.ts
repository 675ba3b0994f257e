/**
 * Bound parameter list that hands out dialect placeholders in order
 */

import type { SqlDialect, SqlParam } from '@schemabridge/core';

export class StatementParams {
  readonly values: SqlParam[] = [];

  constructor(private readonly dialect: SqlDialect) {}

  /** Bind a value and return its placeholder */
  add(value: SqlParam): string {
    this.values.push(value);
    return this.dialect.placeholder(this.values.length);
  }
}
