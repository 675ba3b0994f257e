export { TableStore } from './table-store.js';
export { tableStoreOptionsSchema, writeOptionsSchema } from './options.js';
export type { TableStoreOptions, TableStoreSettings, WriteOptions } from './options.js';
