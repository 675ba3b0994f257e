export { assertIdentifier, assertIdentifiers } from './identifiers.js';
export { StatementParams } from './statement-params.js';
export { normalizeConditions, renderWhere } from './where-clause.js';
