/**
 * Base class for campaign file readers
 * Handles file access, error mapping and cleanup of empty cells
 */

import { readFile, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import type { CampaignRecord, ConnectorConfig } from '@adshift/core';
import { ConnectorError, hasOwnField, isPlainObject, setNestedValue, wrapError } from '@adshift/core';

export interface FileReaderConfig extends ConnectorConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
  /**
   * Expand dotted column names (`targeting.geo`) into nested objects.
   * Default: true. Tabular formats only.
   */
  nestDottedColumns?: boolean;
}

export const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Turn a flat row into a campaign record, dropping empty cells
 */
export function rowToRecord(
  headers: string[],
  cells: unknown[],
  nestDottedColumns: boolean
): CampaignRecord {
  const record: CampaignRecord = {};

  headers.forEach((header, i) => {
    const value = cells[i];
    if (!header || value === null || value === undefined || value === '') {
      return;
    }

    if (nestDottedColumns && header.includes('.')) {
      setNestedValue(record, header, value);
    } else {
      record[header] = value;
    }
  });

  return record;
}

/**
 * Abstract base class for file readers
 */
export abstract class BaseCampaignFileReader<TConfig extends FileReaderConfig> {
  readonly config: TConfig;

  constructor(config: TConfig) {
    this.config = config;
  }

  /**
   * Read every campaign record in the file
   * @throws ConnectorError NOT_FOUND | PERMISSION_DENIED | SCHEMA_MISMATCH | READ_FAILED
   */
  async read(): Promise<CampaignRecord[]> {
    try {
      // Check file exists and is readable
      await access(this.config.filePath, constants.R_OK);

      const content = await readFile(this.config.filePath);
      const records = await this.parseContent(content);

      return records.map((record, index) => this.checkRecord(record, index));
    } catch (error) {
      if (error instanceof ConnectorError) {
        throw error;
      }

      if (errorCode(error) === 'ENOENT') {
        throw new ConnectorError({
          code: 'NOT_FOUND',
          message: `File not found: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (errorCode(error) === 'EACCES') {
        throw new ConnectorError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check file permissions.',
        });
      }

      throw wrapError(error, this.config.id, 'READ_FAILED');
    }
  }

  protected get nestDottedColumns(): boolean {
    return this.config.nestDottedColumns !== false;
  }

  protected decode(content: Buffer): string {
    return content.toString(this.config.encoding ?? 'utf-8');
  }

  protected assertSafeHeaders(headers: string[], format: string): void {
    for (const header of headers) {
      const segments = this.nestDottedColumns ? header.split('.') : [header];
      if (segments.some((segment) => FORBIDDEN_RECORD_KEYS.has(segment))) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe ${format} header name: ${header}`,
          connectorId: this.config.id,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }
  }

  private checkRecord(record: unknown, index: number): CampaignRecord {
    if (!isPlainObject(record)) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Entry ${index + 1} in ${this.config.filePath} is not an object`,
        connectorId: this.config.id,
        suggestion: 'Each campaign must be an object of field names to values.',
      });
    }

    for (const key of FORBIDDEN_RECORD_KEYS) {
      if (hasOwnField(record, key)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Entry ${index + 1} uses the reserved field name '${key}'`,
          connectorId: this.config.id,
        });
      }
    }

    return record;
  }

  /**
   * Parse file content into records (implemented by subclasses)
   */
  protected abstract parseContent(content: Buffer): Promise<unknown[]>;
}
