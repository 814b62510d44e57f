/**
 * Table Reader Interface
 *
 * Every source of long-format rows (CSV, Excel, JSON) implements this
 * interface, so the evaluator can read any of them the same way.
 */

import type { Schema, ReadResult } from '../types/index.js';

/** Configuration common to all connectors */
export interface ConnectorConfig {
  /** Unique identifier for this connector instance */
  id: string;
  /** Human-readable name */
  name: string;
  /** Connector type (csv, json, excel) */
  type: string;
}

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * Base interface all connectors must implement
 */
export interface IConnector<TConfig extends ConnectorConfig = ConnectorConfig> {
  readonly config: TConfig;

  readonly state: ConnectionState;

  /**
   * Open the source and load its rows
   * @throws ConnectorError if the source cannot be read or parsed
   */
  connect(): Promise<void>;

  /** Release loaded rows */
  disconnect(): Promise<void>;

  /**
   * Get the schema of the source, inferred from its rows
   * @param forceRefresh - Re-infer schema even if cached
   */
  getSchema(forceRefresh?: boolean): Promise<Schema>;

  /** Read all rows in source order */
  readRecords(): Promise<ReadResult>;

  /**
   * Check that the source is reachable without loading it
   * @returns true if the source can be read
   */
  testConnection(): Promise<boolean>;
}

export type ConnectorFactory<TConfig extends ConnectorConfig> = (
  config: TConfig
) => IConnector<TConfig>;
