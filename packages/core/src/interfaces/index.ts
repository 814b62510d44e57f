export type {
  ConnectorConfig,
  ConnectionState,
  IConnector,
  ConnectorFactory,
} from './connector.js';
