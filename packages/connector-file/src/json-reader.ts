/**
 * JSON campaign reader
 * Reads an array of campaign objects, at the root or under `recordsPath`
 */

import { ConnectorError, hasOwnField, isPlainObject } from '@adshift/core';
import { BaseCampaignFileReader, FORBIDDEN_RECORD_KEYS, type FileReaderConfig } from './base-file-reader.js';

export interface JsonReaderConfig extends FileReaderConfig {
  type: 'json';
  /** Dot path to the records array (e.g., 'data.campaigns') */
  recordsPath?: string;
}

function parseSafePath(path: string, connectorId: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid recordsPath: "${path}"`,
      connectorId,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.campaigns").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_RECORD_KEYS.has(part)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Unsafe recordsPath segment: "${part}"`,
        connectorId,
      });
    }
  }

  return parts;
}

function getNestedValue(obj: unknown, parts: string[]): unknown {
  let current = obj;
  for (const part of parts) {
    if (!isPlainObject(current) || !hasOwnField(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

export class JsonCampaignReader extends BaseCampaignFileReader<JsonReaderConfig> {
  constructor(config: Omit<JsonReaderConfig, 'type'> & { type?: 'json' }) {
    super({ ...config, type: 'json' });
  }

  protected async parseContent(content: Buffer): Promise<unknown[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.decode(content));
    } catch (error) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (this.config.recordsPath) {
      const records = getNestedValue(parsed, parseSafePath(this.config.recordsPath, this.config.id));
      if (!Array.isArray(records)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Path '${this.config.recordsPath}' does not contain an array`,
          connectorId: this.config.id,
          suggestion: 'Check that recordsPath points to an array of campaign objects.',
        });
      }
      return records;
    }

    // A single campaign object is accepted as a batch of one
    if (isPlainObject(parsed)) {
      return [parsed];
    }

    if (!Array.isArray(parsed)) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: 'JSON file does not contain an array at root level',
        connectorId: this.config.id,
        suggestion: 'Either provide a JSON array of campaigns, or specify recordsPath.',
      });
    }

    return parsed;
  }
}

/**
 * Factory function to create a JSON reader
 */
export function createJsonReader(config: Omit<JsonReaderConfig, 'type'>): JsonCampaignReader {
  return new JsonCampaignReader(config);
}
