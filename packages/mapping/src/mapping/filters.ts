/**
 * Value filters applied by the RecordTransformer
 */

import type { Value } from '@schemabridge/core';
import { formatTimestamp, kindOf, parseTimestamp } from '@schemabridge/core';
import { FieldFailure } from '../errors/index.js';
import type { FilterName } from '../types/index.js';

type BuiltInFilter = (value: Value, field: string) => Value | FieldFailure;

const LEADING_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

/** Leading numeric prefix of a string, 0 when there is none */
function parseLeadingNumber(text: string): number {
  const match = LEADING_NUMBER.exec(text.trim());
  return match ? Number(match[0]) : 0;
}

function toNumber(value: Value): number | null {
  switch (kindOf(value)) {
    case 'absent':
      return null;
    case 'integer':
    case 'decimal':
      return typeof value === 'number' && Number.isFinite(value) ? value : null;
    case 'boolean':
      return value === true ? 1 : 0;
    case 'text':
      return typeof value === 'string' ? parseLeadingNumber(value) : 0;
    case 'timestamp':
      return value instanceof Date ? value.getTime() : null;
    case 'sequence':
      return Array.isArray(value) && value.length > 0 ? 1 : 0;
    case 'record':
      return 1;
  }
}

export function toInt(value: Value): Value {
  const number = toNumber(value);
  return number === null ? null : Math.trunc(number) || 0;
}

export function toFloat(value: Value): Value {
  return toNumber(value);
}

/**
 * Truthiness: null, false, 0, NaN, "", "0" and empty sequences are false
 */
export function toBool(value: Value): Value {
  if (value === null || value === false) return false;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value !== '' && value !== '0';
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

export function toText(value: Value): Value {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatTimestamp(value);
  }
  return JSON.stringify(value);
}

/**
 * Canonical `YYYY-MM-DD HH:MM:SS` (UTC); absent input stays null
 */
export function toDateTime(value: Value, field: string): Value | FieldFailure {
  if (value === null) return null;
  const date = parseTimestamp(value);
  if (date === null) {
    return new FieldFailure(field, 'UNPARSEABLE_TIMESTAMP', `Cannot parse a timestamp from field "${field}"`, value);
  }
  return formatTimestamp(date);
}

export const BUILT_IN_FILTERS: Readonly<Record<FilterName, BuiltInFilter>> = {
  int: toInt,
  float: toFloat,
  bool: toBool,
  string: toText,
  date: toDateTime,
};

export function isFilterName(name: string): name is FilterName {
  return Object.prototype.hasOwnProperty.call(BUILT_IN_FILTERS, name);
}
