/**
 * MappingGenerator
 *
 * Builds a field mapping from one example payload: reserved title/content
 * targets first, then every other top-level field as an identity locator,
 * media reference or repeater.
 */

import type { DataRecord, Value } from '@schemabridge/core';
import { Logger, hasField, isDataRecord, setField } from '@schemabridge/core';
import { isImageArray, isImageLocator, isImageRecord } from '../inference/index.js';
import type {
  FieldMapping,
  MappingEntry,
  MappingOptions,
  ResolvedMappingOptions,
} from '../types/index.js';
import { CONTENT_TARGET, TITLE_TARGET } from '../types/index.js';
import { resolveMappingOptions } from '../validation/index.js';

export interface MappingGeneratorOptions {
  logger?: Logger;
}

/** Non-empty sequence of records that is not a gallery */
function isRepeaterCandidate(value: Value): value is DataRecord[] {
  return Array.isArray(value) && isDataRecord(value[0]) && !isImageArray(value);
}

export class MappingGenerator {
  private readonly logger: Logger;

  constructor(options: MappingGeneratorOptions = {}) {
    this.logger = options.logger ?? new Logger();
  }

  /**
   * Generate a mapping for records shaped like `example`.
   *
   * @throws MappingError (INVALID_OPTIONS) for a negative or fractional
   *   `maxDepth` or empty reserved field names
   */
  generate(example: DataRecord, options: MappingOptions = {}): FieldMapping {
    const resolved = resolveMappingOptions(options);
    const mapping: FieldMapping = {};

    if (hasField(example, resolved.titleField)) {
      setField<MappingEntry>(mapping, TITLE_TARGET, resolved.titleField);
    }
    if (hasField(example, resolved.contentField)) {
      setField<MappingEntry>(mapping, CONTENT_TARGET, resolved.contentField);
    }

    for (const [field, value] of Object.entries(example)) {
      if (field === resolved.titleField || field === resolved.contentField) continue;

      if (hasField(mapping, field)) {
        this.logger.debug('Skipping field that collides with a reserved target', { field });
        continue;
      }

      const entry = this.mapField(field, value, resolved, 1);
      if (entry !== undefined) {
        setField(mapping, field, entry);
      }
    }

    return mapping;
  }

  private mapFields(example: DataRecord, options: ResolvedMappingOptions, level: number): FieldMapping {
    const mapping: FieldMapping = {};
    for (const [field, value] of Object.entries(example)) {
      const entry = this.mapField(field, value, options, level);
      if (entry !== undefined) {
        setField(mapping, field, entry);
      }
    }
    return mapping;
  }

  /**
   * Entry for one field, or undefined when the field is left unmapped
   * (a repeater beyond the depth limit)
   */
  private mapField(
    field: string,
    value: Value,
    options: ResolvedMappingOptions,
    level: number
  ): MappingEntry | undefined {
    if (isRepeaterCandidate(value)) {
      const [first] = value;
      if (options.maxDepth <= 0 || first === undefined) {
        this.logger.debug('Repeater exceeds maximum depth, field not mapped', { field, level });
        return undefined;
      }

      const nested: ResolvedMappingOptions = Object.freeze({ ...options, maxDepth: options.maxDepth - 1 });
      return {
        repeater: true,
        path: field,
        subFields: this.mapFields(first, nested, level + 1),
        depth: level,
      };
    }

    if (options.detectImages) {
      if (isImageLocator(value) || isImageRecord(value)) {
        return { path: field, kind: 'image' };
      }
      if (isImageArray(value)) {
        return { path: field, kind: 'gallery' };
      }
    }

    return field;
  }
}
