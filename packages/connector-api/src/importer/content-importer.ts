/**
 * ContentImporter
 *
 * Writes API records into a content store: transform with a field mapping,
 * match an existing entry by a unique field, declare custom fields, then
 * create or update the entry.
 */

import type { ContentStore, DataRecord, RowId, Value } from '@schemabridge/core';
import { ConnectorError, Logger, setField, wrapError } from '@schemabridge/core';
import type { FieldFailure, FieldMapping } from '@schemabridge/mapping';
import {
  CONTENT_TARGET,
  RESERVED_TARGETS,
  RecordTransformer,
  TITLE_TARGET,
  buildFieldDefinition,
  splitFailures,
} from '@schemabridge/mapping';

export interface ContentImporterOptions {
  store: ContentStore;
  transformer?: RecordTransformer;
  logger?: Logger;
}

export interface SaveOptions {
  /** Target field used to find an existing entry */
  uniqueField?: string;
  /** Declare custom fields before writing (default: true) */
  createFields?: boolean;
}

export type SaveResult =
  | { status: 'created' | 'updated'; id: RowId; failures: FieldFailure[] }
  | { status: 'failed'; error: ConnectorError };

export interface ImportSummary {
  created: number;
  updated: number;
  failed: number;
  results: SaveResult[];
}

function isPresent(value: Value | undefined): value is Exclude<Value, null> {
  return value !== undefined && value !== null && value !== '';
}

export class ContentImporter {
  private readonly store: ContentStore;
  private readonly transformer: RecordTransformer;
  private readonly logger: Logger;

  constructor(options: ContentImporterOptions) {
    this.store = options.store;
    this.logger = options.logger ?? new Logger();
    this.transformer = options.transformer ?? new RecordTransformer({ logger: this.logger });
  }

  /**
   * Save one API record as an entry of `targetType`
   */
  async save(
    apiRecord: Value,
    targetType: string,
    mapping: FieldMapping,
    options: SaveOptions = {}
  ): Promise<SaveResult> {
    const { values, failures } = splitFailures(this.transformer.transform(apiRecord, mapping));
    const createFields = options.createFields ?? true;

    for (const failure of failures) {
      this.logger.warn('Field could not be converted', {
        targetType,
        field: failure.field,
        code: failure.code,
      });
    }

    try {
      const uniqueValue = options.uniqueField ? values[options.uniqueField] : undefined;
      const existing =
        options.uniqueField && isPresent(uniqueValue)
          ? await this.store.findExisting(targetType, options.uniqueField, uniqueValue)
          : null;

      const entry: DataRecord = {
        [TITLE_TARGET]: values[TITLE_TARGET] ?? '',
        [CONTENT_TARGET]: values[CONTENT_TARGET] ?? '',
      };

      for (const [field, value] of Object.entries(values)) {
        if (RESERVED_TARGETS.includes(field)) continue;
        if (createFields) {
          await this.store.ensureFieldDefinition(buildFieldDefinition(field, value, targetType), targetType);
        }
        setField(entry, field, value);
      }

      const id = await this.store.upsert(targetType, existing, entry);
      const status = existing === null ? 'created' : 'updated';
      this.logger.debug('Saved entry', { targetType, id, status });
      return { status, id, failures };
    } catch (error) {
      const wrapped = wrapError(error, 'WRITE_FAILED');
      this.logger.warn('Failed to save entry', { targetType, error: wrapped.message, code: wrapped.code });
      return { status: 'failed', error: wrapped };
    }
  }

  /**
   * Save every record with one mapping. Failed records are reported and
   * the remaining records are still saved.
   */
  async importAll(
    records: readonly Value[],
    targetType: string,
    mapping: FieldMapping,
    options: SaveOptions = {}
  ): Promise<ImportSummary> {
    const summary: ImportSummary = { created: 0, updated: 0, failed: 0, results: [] };

    for (const record of records) {
      const result = await this.save(record, targetType, mapping, options);
      summary.results.push(result);
      summary[result.status] += 1;
    }

    this.logger.info('Import finished', {
      targetType,
      created: summary.created,
      updated: summary.updated,
      failed: summary.failed,
    });
    return summary;
  }
}
