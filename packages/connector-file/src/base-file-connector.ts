/**
 * Base class for file readers
 *
 * A file is parsed once on connect(); rows are then served from memory until
 * disconnect(). Subclasses only turn the file into records.
 */

import { readFile, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import type {
  IConnector,
  ConnectorConfig,
  ConnectionState,
  Schema,
  ReadResult,
  Record,
} from '@longflag/core';
import { ConnectorError } from '@longflag/core';
import { inferSchemaFromRecords } from './schema-inference.js';

export interface FileConnectorConfig extends ConnectorConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

export abstract class BaseFileConnector<TConfig extends FileConnectorConfig>
  implements IConnector<TConfig>
{
  readonly config: TConfig;
  private currentState: ConnectionState = 'disconnected';
  private rows: Record[] = [];
  private schema: Schema | null = null;

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  async connect(): Promise<void> {
    this.currentState = 'connecting';
    this.schema = null;

    try {
      await access(this.config.filePath, constants.R_OK);
      this.rows = await this.loadRecords();
      this.currentState = 'connected';
    } catch (error) {
      this.rows = [];
      this.currentState = 'error';
      throw ConnectorError.fromFileError(error, this.config.id, this.config.filePath);
    }
  }

  async disconnect(): Promise<void> {
    this.rows = [];
    this.schema = null;
    this.currentState = 'disconnected';
  }

  async getSchema(forceRefresh = false): Promise<Schema> {
    this.ensureConnected();

    if (this.schema === null || forceRefresh) {
      this.schema = inferSchemaFromRecords(this.config.name, this.rows, this.config.filePath);
    }
    return this.schema;
  }

  async readRecords(): Promise<ReadResult> {
    this.ensureConnected();

    const records = this.rows.slice();
    return { records, totalCount: records.length };
  }

  async testConnection(): Promise<boolean> {
    return access(this.config.filePath, constants.R_OK).then(
      () => true,
      () => false
    );
  }

  protected ensureConnected(): void {
    if (this.currentState !== 'connected') {
      throw new ConnectorError({
        code: 'NOT_CONNECTED',
        message: `Source '${this.config.id}' is not connected (state: ${this.currentState})`,
        sourceId: this.config.id,
        location: this.config.filePath,
      });
    }
  }

  protected async readText(): Promise<string> {
    return readFile(this.config.filePath, this.config.encoding ?? 'utf-8');
  }

  /** Parse the whole file into records */
  protected abstract loadRecords(): Promise<Record[]>;
}
