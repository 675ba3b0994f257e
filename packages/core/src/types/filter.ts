/**
 * Condition and query syntax for table reads, updates and deletes
 */

import type { Value } from './value.js';

export type FilterOperator =
  | 'eq'       // equals
  | 'neq'      // not equals
  | 'gt'       // greater than
  | 'lt'       // less than
  | 'gte'      // greater than or equal
  | 'lte'      // less than or equal
  | 'contains' // string contains
  | 'in';      // value in array

export interface FilterCondition {
  field: string;
  op: FilterOperator;
  value: Value;
}

/**
 * Shorthand conditions: `{ status: 'open' }` is equality,
 * `{ id: [1, 2] }` is membership
 */
export type ConditionMap = { [field: string]: Value };

export type Conditions = ConditionMap | FilterCondition[];

export interface QueryOptions {
  /** Sort configuration */
  orderBy?: {
    field: string;
    direction: 'asc' | 'desc';
  }[];
  /** Number of rows to skip */
  offset?: number;
  /** Max rows to return */
  limit?: number;
}

/**
 * Type guard to check if a value is a valid FilterOperator
 */
export function isFilterOperator(value: unknown): value is FilterOperator {
  return (
    typeof value === 'string' &&
    ['eq', 'neq', 'gt', 'lt', 'gte', 'lte', 'contains', 'in'].includes(value)
  );
}

/**
 * Normalise either condition form into a list of conditions.
 * Arrays in the shorthand form become `in` conditions.
 */
export function toFilterConditions(conditions: Conditions): FilterCondition[] {
  if (Array.isArray(conditions)) {
    return conditions;
  }
  return Object.entries(conditions).map(([field, value]) => ({
    field,
    op: Array.isArray(value) ? 'in' : 'eq',
    value,
  }));
}
