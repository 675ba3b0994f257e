/**
 * SchemaBuilder
 *
 * Derives the column schema of a table from one example record.
 */

import type {
  ColumnDefinition,
  ColumnSchema,
  DataRecord,
  PrimaryKeyType,
  StorageType,
} from '@schemabridge/core';
import { formatStorageType, hasField } from '@schemabridge/core';
import { MappingError } from '../errors/index.js';
import { inferStorageType } from '../inference/index.js';

/** Inferred types a primary key of each type can hold */
const KEY_COMPATIBILITY: Record<PrimaryKeyType, readonly StorageType[]> = {
  INTEGER: ['INTEGER'],
  VARCHAR: ['VARCHAR', 'INTEGER'],
};

export class SchemaBuilder {
  /**
   * Build the ordered column schema for an example record.
   *
   * Columns follow the record's field order. When the primary key is not a
   * field of the example, an auto-generated key column is prepended;
   * otherwise that field's column becomes the key in place.
   *
   * @throws MappingError (SCHEMA_CONFLICT) if the example's key value cannot
   *   be stored in a key of `primaryKeyType`
   */
  build(
    example: DataRecord,
    primaryKey = 'id',
    primaryKeyType: PrimaryKeyType = 'INTEGER'
  ): ColumnSchema {
    const columns: ColumnDefinition[] = Object.entries(example).map(([name, value]) => ({
      name,
      type: inferStorageType(value),
      primaryKey: false,
      autoGenerated: false,
    }));

    if (!hasField(example, primaryKey)) {
      return [
        { name: primaryKey, type: primaryKeyType, primaryKey: true, autoGenerated: true },
        ...columns,
      ];
    }

    const keyValue = example[primaryKey];
    const index = columns.findIndex((column) => column.name === primaryKey);
    const inferred = columns[index];

    if (inferred && keyValue !== null && !KEY_COMPATIBILITY[primaryKeyType].includes(inferred.type)) {
      throw new MappingError({
        code: 'SCHEMA_CONFLICT',
        message: `Primary key "${primaryKey}" is declared ${primaryKeyType} but the example value is ${formatStorageType(inferred.type)}`,
        suggestion: `Use a ${primaryKeyType}-compatible example value, choose another primary key field, or change the primary key type.`,
        context: { primaryKey, primaryKeyType, inferredType: inferred.type },
      });
    }

    columns[index] = { name: primaryKey, type: primaryKeyType, primaryKey: true, autoGenerated: false };
    return columns;
  }
}
