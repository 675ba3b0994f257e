/**
 * Content Store Interface
 *
 * Persistence collaborator of a content system: typed entries with custom
 * fields. Mapped records are written through it by the content importer.
 */

import type { ContentFieldDefinition, DataRecord, RowId, Value } from '../types/index.js';

export interface ContentStore {
  /**
   * Find an entry whose unique field holds the given value
   * @returns entry id, or null when none exists
   */
  findExisting(targetType: string, uniqueField: string, uniqueValue: Value): Promise<RowId | null>;

  /**
   * Create (id null) or update an entry. Repeater fields arrive as arrays of
   * row records and replace the stored rows.
   * @returns id of the written entry
   * @throws ConnectorError when the write is rejected
   */
  upsert(targetType: string, id: RowId | null, record: DataRecord): Promise<RowId>;

  /**
   * Declare a custom field on the target type. Must be idempotent.
   */
  ensureFieldDefinition(definition: ContentFieldDefinition, targetType: string): Promise<void>;
}
