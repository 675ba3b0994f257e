export type { ScalarValue, Value, DataRecord, ValueKind } from './value.js';
export {
  isDataRecord,
  kindOf,
  toValue,
  toDataRecord,
  setField,
  hasField,
} from './value.js';

export type {
  StorageType,
  PrimaryKeyType,
  ColumnDefinition,
  ColumnSchema,
  FieldKind,
  ContentFieldDefinition,
} from './schema.js';
export { VARCHAR_LENGTH, formatStorageType, formatColumn, findPrimaryKey } from './schema.js';

export type {
  FilterOperator,
  FilterCondition,
  ConditionMap,
  Conditions,
  QueryOptions,
} from './filter.js';
export { isFilterOperator, toFilterConditions } from './filter.js';

export type {
  StoredRow,
  SqlParam,
  RowId,
  ExecuteResult,
  BatchInsertResult,
} from './record.js';
