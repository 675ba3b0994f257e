export { SchemaBuilder } from './schema-builder.js';
