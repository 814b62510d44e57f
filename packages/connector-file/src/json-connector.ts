/**
 * JSON Connector
 * Reads JSON files holding an array of row objects
 */

import type { Record } from '@longflag/core';
import { ConnectorError, isForbiddenKey } from '@longflag/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface JsonConnectorConfig extends FileConnectorConfig {
  type: 'json';
  /** Dot path to the records array (e.g., 'data.items') */
  recordsPath?: string;
}

function parseSafePath(path: string, sourceId: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid recordsPath: "${path}"`,
      sourceId,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.items").',
    });
  }

  for (const part of parts) {
    if (isForbiddenKey(part)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Unsafe recordsPath segment: "${part}"`,
        sourceId,
        suggestion:
          'Avoid __proto__/prototype/constructor in recordsPath to prevent prototype pollution.',
      });
    }
  }

  return parts;
}

function isRecord(value: unknown): value is Record {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get nested value from object using dot notation path
 */
function getNestedValue(obj: unknown, parts: string[]): unknown {
  let current = obj;

  for (const part of parts) {
    if (!isRecord(current)) {
      return undefined;
    }

    if (!Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }

    current = current[part];
  }

  return current;
}

export class JsonConnector extends BaseFileConnector<JsonConnectorConfig> {
  constructor(config: Omit<JsonConnectorConfig, 'type'> & { type?: 'json' }) {
    super({ ...config, type: 'json' });
  }

  protected async loadRecords(): Promise<Record[]> {
    return this.parseContent(await this.readText());
  }

  parseContent(content: string): Record[] {
    // Validate the path before touching the content
    const pathParts = this.config.recordsPath
      ? parseSafePath(this.config.recordsPath, this.config.id)
      : null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
    } catch (error) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        sourceId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const records = pathParts ? getNestedValue(parsed, pathParts) : parsed;

    if (!Array.isArray(records)) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: pathParts
          ? `Path '${this.config.recordsPath}' does not contain an array`
          : 'JSON file does not contain an array at root level',
        sourceId: this.config.id,
        suggestion: pathParts
          ? 'Check that recordsPath points to an array of objects.'
          : 'Either provide a JSON file with an array at root, or specify recordsPath.',
      });
    }

    const index = records.findIndex((item) => !isRecord(item));
    if (index !== -1) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Element ${index} of the records array is not an object`,
        sourceId: this.config.id,
        suggestion: 'Each element must be an object with one field per column.',
      });
    }

    return records.filter(isRecord);
  }
}

export function createJsonConnector(
  config: Omit<JsonConnectorConfig, 'type'>
): JsonConnector {
  return new JsonConnector(config);
}
