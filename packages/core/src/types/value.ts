/**
 * Value model
 *
 * Closed set of values that flow through inference, mapping and storage.
 * Payloads decoded from JSON, rows read back from a database and example
 * records supplied by callers are all expressed with these types.
 */

export type ScalarValue = string | number | boolean | Date | null;

export type Value = ScalarValue | Value[] | DataRecord;

/** A nested record: field name to value, in insertion order */
export interface DataRecord {
  [field: string]: Value;
}

/** Variant tags for every value `kindOf` can see */
export type ValueKind =
  | 'absent'
  | 'integer'
  | 'decimal'
  | 'boolean'
  | 'text'
  | 'timestamp'
  | 'record'
  | 'sequence';

/**
 * Plain-object guard (excludes arrays, dates and class instances)
 */
export function isDataRecord(value: unknown): value is DataRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value) as unknown;
  return proto === Object.prototype || proto === null;
}

/**
 * Classify a value into its variant.
 *
 * `undefined`, `null` and invalid dates are all `absent`.
 */
export function kindOf(value: Value | undefined): ValueKind {
  if (value === undefined || value === null) return 'absent';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'decimal';
  }
  if (typeof value === 'string') return 'text';
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'absent' : 'timestamp';
  }
  if (Array.isArray(value)) return 'sequence';
  return 'record';
}

/**
 * Convert an arbitrary decoded value (JSON, driver cell) into a `Value`.
 */
export function toValue(input: unknown): Value {
  if (input === null || input === undefined) return null;

  switch (typeof input) {
    case 'string':
    case 'number':
    case 'boolean':
      return input;
    case 'bigint':
      return Number.isSafeInteger(Number(input)) ? Number(input) : input.toString();
    case 'function':
    case 'symbol':
      return null;
    default:
      break;
  }

  if (input instanceof Date) return input;
  if (Buffer.isBuffer(input)) return input.toString('utf-8');
  if (Array.isArray(input)) return input.map(toValue);

  const record: DataRecord = {};
  for (const [key, entry] of Object.entries(input)) {
    setField(record, key, toValue(entry));
  }
  return record;
}

/**
 * Assign an own field, including one literally named `__proto__`
 */
export function setField<T>(record: { [field: string]: T }, field: string, value: T): void {
  if (field === '__proto__') {
    Object.defineProperty(record, field, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
    return;
  }
  record[field] = value;
}

export function hasField(record: object, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, field);
}

/**
 * Convert a decoded value that must be a record (e.g. a JSON object payload).
 * Returns null when the input is not an object.
 */
export function toDataRecord(input: unknown): DataRecord | null {
  const value = toValue(input);
  return isDataRecord(value) ? value : null;
}
