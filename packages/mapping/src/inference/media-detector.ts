/**
 * Media detection
 *
 * Recognises image references in payload values: image URLs or paths,
 * records carrying an image `url`, and galleries (sequences of either).
 */

import type { Value } from '@schemabridge/core';
import { isDataRecord } from '@schemabridge/core';

export const IMAGE_EXTENSIONS: readonly string[] = ['jpg', 'jpeg', 'png', 'gif', 'webp', 'bmp', 'svg'];

/**
 * Path component of a URL or relative locator (no query string or fragment)
 */
function pathComponent(locator: string): string {
  try {
    return new URL(locator).pathname;
  } catch {
    return locator.split(/[?#]/, 1)[0] ?? '';
  }
}

function extensionOf(path: string): string {
  const segment = path.slice(path.lastIndexOf('/') + 1);
  const dot = segment.lastIndexOf('.');
  return dot > 0 ? segment.slice(dot + 1).toLowerCase() : '';
}

/**
 * Whether a value is a string whose path ends in an image extension
 */
export function isImageLocator(value: Value | undefined): value is string {
  if (typeof value !== 'string' || value.length === 0) return false;
  return IMAGE_EXTENSIONS.includes(extensionOf(pathComponent(value)));
}

/**
 * Record whose `url` field is an image locator
 */
export function isImageRecord(value: Value | undefined): boolean {
  return isDataRecord(value) && isImageLocator(value['url']);
}

/**
 * Sequence whose first element is an image locator or image record
 */
export function isImageArray(value: Value | undefined): value is Value[] {
  if (!Array.isArray(value) || value.length === 0) return false;
  const first = value[0];
  return isImageLocator(first) || isImageRecord(first);
}
