/**
 * Field Mapping Types
 *
 * A field mapping describes how a nested source payload becomes a flat
 * target record: target field name → source locator or repeater spec.
 */

import type { Value } from '@schemabridge/core';
import type { FieldFailure } from '../errors/index.js';

/** Built-in value filters */
export type FilterName = 'int' | 'float' | 'bool' | 'string' | 'date';

/** Caller-supplied pure conversion */
export type FilterFn = (value: Value) => Value;

export type ValueFilter = FilterName | FilterFn;

/** Media references recognised during mapping generation */
export type MediaKind = 'image' | 'gallery';

/**
 * Dotted path into a nested record, either bare or as a descriptor
 * carrying a `path` attribute
 */
export type Locator = string | { path: string };

/** Plain field entry with optional filter or media marker */
export interface FieldSource {
  path: string;
  /**
   * Built-in filter name or conversion function. Mappings loaded from
   * JSON may name filters this package does not know; those pass values
   * through unchanged.
   */
  filter?: ValueFilter | string;
  kind?: MediaKind;
}

/** One-to-many nested rows, each mapped with `subFields` */
export interface RepeaterSpec {
  repeater: true;
  path: string;
  subFields: FieldMapping;
  /** Nesting level of this repeater (1 = top level) */
  depth: number;
}

export type MappingEntry = string | FieldSource | RepeaterSpec;

/** Ordered target field → entry */
export interface FieldMapping {
  [target: string]: MappingEntry;
}

/** Options for generating a mapping from an example payload */
export interface MappingOptions {
  /** Source field mapped to the reserved `title` target (default: title) */
  titleField?: string;
  /** Source field mapped to the reserved `content` target (default: content) */
  contentField?: string;
  /** Mark image strings and image arrays as media (default: true) */
  detectImages?: boolean;
  /** Maximum repeater nesting (default: 3); 0 disables repeaters */
  maxDepth?: number;
}

export type ResolvedMappingOptions = Readonly<Required<MappingOptions>>;

/** Reserved target fields filled from `titleField` / `contentField` */
export const TITLE_TARGET = 'title';
export const CONTENT_TARGET = 'content';
export const RESERVED_TARGETS: readonly string[] = [TITLE_TARGET, CONTENT_TARGET];

/** Value in a transformed record */
export type TransformedValue = Value | FieldFailure | TransformedRecord[];

/** Output of a record transformation, ready for persistence */
export interface TransformedRecord {
  [target: string]: TransformedValue;
}

export function isRepeaterSpec(entry: MappingEntry): entry is RepeaterSpec {
  return typeof entry === 'object' && 'repeater' in entry && entry.repeater === true;
}
