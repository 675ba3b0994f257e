/**
 * TableStore options
 */

import { z } from 'zod';
import type { Logger } from '@schemabridge/core';
import { ConnectorError, identifierSchema, primaryKeyTypeSchema } from '@schemabridge/core';

export const tableStoreOptionsSchema = z
  .object({
    primaryKey: identifierSchema.default('id'),
    primaryKeyType: primaryKeyTypeSchema.default('INTEGER'),
    autoCreate: z.boolean().default(true),
  })
  .strict();

/** Per-call overrides for insert and batchInsert */
export const writeOptionsSchema = tableStoreOptionsSchema.partial();

export type TableStoreSettings = z.infer<typeof tableStoreOptionsSchema>;
export type WriteOptions = z.input<typeof writeOptionsSchema>;

export interface TableStoreOptions extends WriteOptions {
  logger?: Logger;
}

export function parseOptions<T extends z.ZodTypeAny>(schema: T, input: unknown, subject: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConnectorError({
      code: 'VALIDATION_ERROR',
      message: `Invalid ${subject}: ${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid'}`,
    });
  }
  return result.data;
}
