export { ConnectorError, wrapError } from './connector-error.js';
export type { ConnectorErrorCode, ConnectorErrorDetails } from './connector-error.js';
