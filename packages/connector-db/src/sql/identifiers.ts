/**
 * Identifier validation
 *
 * Table and column names are interpolated into statement text (values never
 * are), so every name is checked before it reaches a dialect.
 */

import { ConnectorError, identifierSchema } from '@schemabridge/core';

export type IdentifierKind = 'schema' | 'table' | 'column';

/**
 * @throws ConnectorError (VALIDATION_ERROR) for anything but
 *   `[A-Za-z_][A-Za-z0-9_]*`
 */
export function assertIdentifier(name: string, kind: IdentifierKind): void {
  if (!identifierSchema.safeParse(name).success) {
    throw new ConnectorError({
      code: 'VALIDATION_ERROR',
      message: `Invalid ${kind} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      suggestion: `Use only valid SQL identifiers for ${kind} names.`,
      context: { [kind]: name },
    });
  }
}

export function assertIdentifiers(names: Iterable<string>, kind: IdentifierKind): void {
  for (const name of names) {
    assertIdentifier(name, kind);
  }
}
