/**
 * PathResolver
 *
 * Resolves dotted locators (`author.name`, `items.0.sku`) against nested
 * records. Missing segments resolve to `undefined` rather than throwing.
 */

import type { Value } from '@schemabridge/core';
import { hasField, isDataRecord } from '@schemabridge/core';
import type { Locator } from '../types/index.js';

const INDEX_SEGMENT = /^(?:0|[1-9]\d*)$/;

export function locatorPath(locator: Locator): string {
  return typeof locator === 'string' ? locator : locator.path;
}

/**
 * Walk `record` one segment at a time.
 *
 * Own fields of records are followed by name, elements of sequences by
 * numeric index. A record field whose name is the whole remaining path
 * (`@odata.etag`) wins over splitting it. Any missing or null intermediate
 * yields `undefined`.
 */
export function resolvePath(record: Value, locator: Locator): Value | undefined {
  const segments = locatorPath(locator).split('.');
  let current: Value | undefined = record;

  for (let index = 0; index < segments.length; index++) {
    const segment = segments[index] ?? '';

    if (isDataRecord(current)) {
      const rest = segments.slice(index).join('.');
      if (index < segments.length - 1 && hasField(current, rest)) {
        return current[rest];
      }
      current = hasField(current, segment) ? current[segment] : undefined;
    } else if (Array.isArray(current) && INDEX_SEGMENT.test(segment)) {
      current = current[Number(segment)];
    } else {
      return undefined;
    }

    if (current === undefined) return undefined;
  }

  return current;
}
