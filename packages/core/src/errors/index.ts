export { ConnectorError, isConnectorError, wrapError, errorMessage } from './connector-error.js';
export type { ErrorCode, ConnectorErrorDetails } from './connector-error.js';
