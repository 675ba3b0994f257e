/**
 * WHERE clause rendering for table conditions
 */

import type { Conditions, FilterCondition, SqlDialect, Value } from '@schemabridge/core';
import { ConnectorError, filterConditionSchema, toFilterConditions, toStorageParam } from '@schemabridge/core';
import type { StatementParams } from './statement-params.js';

const COMPARISON: Record<Exclude<FilterCondition['op'], 'contains' | 'in'>, string> = {
  eq: '=',
  neq: '<>',
  gt: '>',
  lt: '<',
  gte: '>=',
  lte: '<=',
};

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function likeText(value: Value): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function renderCondition(dialect: SqlDialect, params: StatementParams, condition: FilterCondition): string {
  const column = dialect.quoteIdentifier(condition.field);
  const { op, value } = condition;

  switch (op) {
    case 'in': {
      const members = Array.isArray(value) ? value : [value];
      if (members.length === 0) return '1 = 0';
      const placeholders = members.map((member) => params.add(toStorageParam(member)));
      return `${column} IN (${placeholders.join(', ')})`;
    }
    case 'contains':
      return `${column} LIKE ${params.add(`%${escapeLike(likeText(value))}%`)}`;
    case 'eq':
      if (value === null) return `${column} IS NULL`;
      return `${column} = ${params.add(toStorageParam(value))}`;
    case 'neq':
      if (value === null) return `${column} IS NOT NULL`;
      return `${column} <> ${params.add(toStorageParam(value))}`;
    default:
      return `${column} ${COMPARISON[op]} ${params.add(toStorageParam(value))}`;
  }
}

/**
 * Normalise and validate conditions in either form
 * @throws ConnectorError (VALIDATION_ERROR) for an unsafe column or unknown operator
 */
export function normalizeConditions(conditions: Conditions): FilterCondition[] {
  const list = toFilterConditions(conditions);
  for (const condition of list) {
    const result = filterConditionSchema.safeParse(condition);
    if (!result.success) {
      throw new ConnectorError({
        code: 'VALIDATION_ERROR',
        message: `Invalid condition on "${condition.field}": ${result.error.issues[0]?.message ?? 'invalid'}`,
        suggestion: 'Conditions are { field, op, value } with op one of eq, neq, gt, lt, gte, lte, contains, in.',
      });
    }
  }
  return list;
}

/**
 * ` WHERE a = ? AND b IN (?, ?)`, or an empty string without conditions
 */
export function renderWhere(dialect: SqlDialect, params: StatementParams, conditions: FilterCondition[]): string {
  if (conditions.length === 0) return '';
  return ` WHERE ${conditions.map((condition) => renderCondition(dialect, params, condition)).join(' AND ')}`;
}
