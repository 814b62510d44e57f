export { ConnectorError } from './connector-error.js';
export type { ConnectorErrorCode, ConnectorErrorDetails } from './connector-error.js';
