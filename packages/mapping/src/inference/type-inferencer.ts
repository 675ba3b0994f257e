/**
 * Type inference
 *
 * Derives the storage type of a column, or the kind of a content field,
 * from a single example value. Both functions are pure and total.
 */

import type { FieldKind, StorageType, Value } from '@schemabridge/core';
import { VARCHAR_LENGTH, isDataRecord, isTimestampString, kindOf } from '@schemabridge/core';
import { isImageArray, isImageLocator, isImageRecord } from './media-detector.js';

const INTEGER_STRING = /^[+-]?\d+$/;
const DECIMAL_STRING = /^[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Length in code points, as counted by VARCHAR columns */
export function textLength(value: string): number {
  return Array.from(value).length;
}

/**
 * Storage type for one example value.
 *
 * integer → INTEGER, float → DECIMAL, boolean → BOOLEAN, timestamp →
 * DATETIME, gallery-shaped sequence → GALLERY, image record → IMAGE, other
 * records and sequences → LONG_TEXT, strings → VARCHAR up to 255 code
 * points and LONG_TEXT beyond. Absent values default to VARCHAR.
 */
export function inferStorageType(value: Value | undefined): StorageType {
  switch (kindOf(value)) {
    case 'integer':
      return 'INTEGER';
    case 'decimal':
      return 'DECIMAL';
    case 'boolean':
      return 'BOOLEAN';
    case 'sequence':
      return isImageArray(value) ? 'GALLERY' : 'LONG_TEXT';
    case 'record':
      return isImageRecord(value) ? 'IMAGE' : 'LONG_TEXT';
    case 'timestamp':
      return 'DATETIME';
    case 'text':
      return typeof value === 'string' && textLength(value) > VARCHAR_LENGTH ? 'LONG_TEXT' : 'VARCHAR';
    case 'absent':
      return 'VARCHAR';
  }
}

function isAbsoluteUrl(value: string): boolean {
  if (!/^[a-z][a-z0-9+.-]*:\/\/\S+$/i.test(value)) return false;
  try {
    return new URL(value).host.length > 0;
  } catch {
    return false;
  }
}

function inferTextKind(value: string): FieldKind {
  const trimmed = value.trim();
  if (INTEGER_STRING.test(trimmed)) return 'integer';
  if (DECIMAL_STRING.test(trimmed)) return 'decimal';
  if (isAbsoluteUrl(value)) return isImageLocator(value) ? 'image' : 'url';
  if (isTimestampString(value)) return 'timestamp';
  return textLength(value) > VARCHAR_LENGTH ? 'long_text' : 'text';
}

/**
 * Content field kind for one example value.
 *
 * Sequences are galleries (image arrays), repeaters (first element is a
 * record) or generic collections. Strings are refined into numbers, URLs,
 * images and timestamps before falling back to text.
 */
export function inferFieldKind(value: Value | undefined): FieldKind {
  switch (kindOf(value)) {
    case 'integer':
      return 'integer';
    case 'decimal':
      return 'decimal';
    case 'boolean':
      return 'boolean';
    case 'timestamp':
      return 'timestamp';
    case 'sequence':
      if (isImageArray(value)) return 'gallery';
      return Array.isArray(value) && isDataRecord(value[0]) ? 'repeater' : 'collection';
    case 'record':
      return isImageRecord(value) ? 'image' : 'collection';
    case 'text':
      return typeof value === 'string' ? inferTextKind(value) : 'text';
    case 'absent':
      return 'text';
  }
}
