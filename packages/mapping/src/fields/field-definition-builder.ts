/**
 * Content field definitions
 *
 * Describes a target content field from a sample value, for content stores
 * that declare custom fields before values are written to them.
 */

import type { ContentFieldDefinition, Value } from '@schemabridge/core';
import { humanizeFieldName, isDataRecord } from '@schemabridge/core';
import { inferFieldKind } from '../inference/index.js';

export const MEDIA_MIME_TYPES: readonly string[] = ['jpg', 'jpeg', 'png', 'gif', 'webp'];

/** `field_<targetType>_<name>`; keys are stable so definitions stay idempotent */
export function fieldKey(targetType: string, name: string): string {
  return `field_${targetType}_${name}`;
}

function subFieldDefinitions(
  sample: Value,
  targetType: string,
  parent: string
): ContentFieldDefinition[] {
  if (!Array.isArray(sample)) return [];
  const [first] = sample;
  if (!isDataRecord(first)) return [];

  return Object.entries(first).map(([name, value]) => ({
    key: fieldKey(targetType, `${parent}_${name}`),
    label: humanizeFieldName(name),
    name,
    kind: inferFieldKind(value),
  }));
}

/**
 * Build the definition of field `name` of `targetType` from a sample value.
 *
 * Repeaters carry one sub-field per field of their first row; image and
 * gallery fields return arrays and accept common web image types.
 */
export function buildFieldDefinition(
  name: string,
  sampleValue: Value,
  targetType: string
): ContentFieldDefinition {
  const kind = inferFieldKind(sampleValue);
  const definition: ContentFieldDefinition = {
    key: fieldKey(targetType, name),
    label: humanizeFieldName(name),
    name,
    kind,
  };

  if (kind === 'repeater') {
    definition.subFields = subFieldDefinitions(sampleValue, targetType, name);
  }

  if (kind === 'image' || kind === 'gallery') {
    definition.returnFormat = 'array';
    definition.mimeTypes = [...MEDIA_MIME_TYPES];
  }

  return definition;
}
