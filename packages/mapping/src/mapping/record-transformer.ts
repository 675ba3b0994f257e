/**
 * RecordTransformer
 *
 * Applies a field mapping to source payloads. Each target field is produced
 * independently: an absent source yields null, an unparseable timestamp
 * yields a FieldFailure marker, and the rest of the record is still built.
 */

import type { DataRecord, Value } from '@schemabridge/core';
import { Logger, isDataRecord, setField } from '@schemabridge/core';
import { FieldFailure, isFieldFailure } from '../errors/index.js';
import type {
  FieldMapping,
  FieldSource,
  MappingEntry,
  TransformedRecord,
  TransformedValue,
} from '../types/index.js';
import { isRepeaterSpec } from '../types/index.js';
import { BUILT_IN_FILTERS, isFilterName } from './filters.js';
import { resolvePath } from './path-resolver.js';

export interface RecordTransformerOptions {
  logger?: Logger;
}

/** Storable values plus the failures that were replaced by null */
export interface SplitRecord {
  values: DataRecord;
  failures: FieldFailure[];
}

export class RecordTransformer {
  private readonly logger: Logger;
  private readonly warnedFilters = new Set<string>();

  constructor(options: RecordTransformerOptions = {}) {
    this.logger = options.logger ?? new Logger();
  }

  /**
   * Transform one source record, target fields in mapping order
   */
  transform(source: Value, mapping: FieldMapping): TransformedRecord {
    const record: TransformedRecord = {};
    for (const [target, entry] of Object.entries(mapping)) {
      setField(record, target, this.transformEntry(source, target, entry));
    }
    return record;
  }

  /**
   * Transform a batch of source records with one mapping
   */
  transformAll(sources: readonly Value[], mapping: FieldMapping): TransformedRecord[] {
    return sources.map((source) => this.transform(source, mapping));
  }

  private transformEntry(source: Value, target: string, entry: MappingEntry): TransformedValue {
    if (typeof entry === 'string') {
      return resolvePath(source, entry) ?? null;
    }

    if (isRepeaterSpec(entry)) {
      const rows = resolvePath(source, entry.path);
      if (!Array.isArray(rows)) return [];
      return rows.map((row) => this.transform(isDataRecord(row) ? row : {}, entry.subFields));
    }

    const value = resolvePath(source, entry.path) ?? null;
    return entry.filter === undefined ? value : this.applyFilter(value, target, entry.filter);
  }

  private applyFilter(value: Value, target: string, filter: NonNullable<FieldSource['filter']>): Value | FieldFailure {
    if (typeof filter === 'function') {
      return filter(value);
    }

    if (isFilterName(filter)) {
      return BUILT_IN_FILTERS[filter](value, target);
    }

    if (!this.warnedFilters.has(filter)) {
      this.warnedFilters.add(filter);
      this.logger.warn('Unsupported filter, passing value through', { filter, field: target });
    }
    return value;
  }
}

function isTransformedRows(value: TransformedValue): value is TransformedRecord[] {
  if (!Array.isArray(value)) return false;
  const items: readonly unknown[] = value;
  return items.every((item) => isDataRecord(item));
}

/**
 * Separate a transformed record into storable values (failures replaced by
 * null) and the failures, reported with dotted paths such as
 * `comments.0.date`.
 */
export function splitFailures(record: TransformedRecord): SplitRecord {
  const values: DataRecord = {};
  const failures: FieldFailure[] = [];

  for (const [field, value] of Object.entries(record)) {
    if (isFieldFailure(value)) {
      failures.push(value.field === field ? value : new FieldFailure(field, value.code, value.message, value.input));
      setField<Value>(values, field, null);
      continue;
    }

    if (isTransformedRows(value)) {
      const rows: DataRecord[] = [];
      value.forEach((row, index) => {
        const split = splitFailures(row);
        rows.push(split.values);
        for (const failure of split.failures) {
          failures.push(failure.under(`${field}.${index}`));
        }
      });
      setField<Value>(values, field, rows);
      continue;
    }

    setField<Value>(values, field, value);
  }

  return { values, failures };
}
