/**
 * Zod schemas for validating storage inputs
 */

import { z } from 'zod';

/** SQL identifier (alphanumeric + underscore, starting with a letter or underscore) */
export const identifierSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Must be alphanumeric with underscores, starting with a letter or underscore');

/** Filter operator enum */
export const filterOperatorSchema = z.enum([
  'eq',
  'neq',
  'gt',
  'lt',
  'gte',
  'lte',
  'contains',
  'in',
]);

/** Single filter condition */
export const filterConditionSchema = z.object({
  field: identifierSchema,
  op: filterOperatorSchema,
  value: z.unknown(),
});

/** Sort order */
export const orderBySchema = z.object({
  field: identifierSchema,
  direction: z.enum(['asc', 'desc']),
});

/** Read options */
export const queryOptionsSchema = z
  .object({
    orderBy: z.array(orderBySchema).optional(),
    offset: z.number().int().min(0).optional(),
    limit: z.number().int().min(1).max(10000).optional(),
  })
  .strict();

/** Primary key column type */
export const primaryKeyTypeSchema = z.enum(['INTEGER', 'VARCHAR']);

/** Export types from schemas */
export type FilterOperatorInput = z.infer<typeof filterOperatorSchema>;
export type FilterConditionInput = z.infer<typeof filterConditionSchema>;
export type QueryOptionsInput = z.infer<typeof queryOptionsSchema>;
