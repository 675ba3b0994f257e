/**
 * Zod schemas for mapping options and stored mapping definitions
 */

import { z } from 'zod';
import { MappingError } from '../errors/index.js';
import type {
  FieldMapping,
  MappingEntry,
  MappingOptions,
  ResolvedMappingOptions,
} from '../types/index.js';

export const mappingOptionsSchema = z
  .object({
    titleField: z.string().min(1).default('title'),
    contentField: z.string().min(1).default('content'),
    detectImages: z.boolean().default(true),
    maxDepth: z.number().int().min(0).default(3),
  })
  .strict();

const fieldSourceSchema = z
  .object({
    path: z.string().min(1),
    filter: z.string().min(1).optional(),
    kind: z.enum(['image', 'gallery']).optional(),
  })
  .strict();

export const mappingEntrySchema: z.ZodType<MappingEntry> = z.lazy(() =>
  z.union([
    z.string().min(1),
    z
      .object({
        repeater: z.literal(true),
        path: z.string().min(1),
        subFields: z.record(mappingEntrySchema),
        depth: z.number().int().min(1),
      })
      .strict(),
    fieldSourceSchema,
  ])
);

export const fieldMappingSchema: z.ZodType<FieldMapping> = z.record(mappingEntrySchema);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Apply defaults and validate generator options
 * @throws MappingError (INVALID_OPTIONS)
 */
export function resolveMappingOptions(options: MappingOptions = {}): ResolvedMappingOptions {
  const result = mappingOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new MappingError({
      code: 'INVALID_OPTIONS',
      message: `Invalid mapping options:\n${formatIssues(result.error)}`,
      suggestion: 'maxDepth must be a non-negative integer; titleField and contentField must be non-empty.',
    });
  }
  return Object.freeze(result.data);
}

/**
 * Validate a mapping loaded from configuration
 * @throws MappingError (INVALID_MAPPING)
 */
export function parseFieldMapping(input: unknown): FieldMapping {
  const result = fieldMappingSchema.safeParse(input);
  if (!result.success) {
    throw new MappingError({
      code: 'INVALID_MAPPING',
      message: `Invalid field mapping:\n${formatIssues(result.error)}`,
      suggestion: 'Entries are a source path, { path, filter?, kind? } or { repeater: true, path, subFields, depth }.',
    });
  }
  return result.data;
}
