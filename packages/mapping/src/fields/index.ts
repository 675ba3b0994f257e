export { buildFieldDefinition, fieldKey, MEDIA_MIME_TYPES } from './field-definition-builder.js';
