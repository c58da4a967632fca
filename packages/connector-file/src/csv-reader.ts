/**
 * CSV campaign reader
 * The first row names the fields; dotted headers become nested objects
 */

import { parse } from 'csv-parse/sync';
import type { CampaignRecord } from '@adshift/core';
import { ConnectorError } from '@adshift/core';
import { BaseCampaignFileReader, rowToRecord, type FileReaderConfig } from './base-file-reader.js';

export interface CsvReaderConfig extends FileReaderConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
}

function toRows(parsed: unknown): unknown[][] {
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((row): row is unknown[] => Array.isArray(row));
}

export class CsvCampaignReader extends BaseCampaignFileReader<CsvReaderConfig> {
  constructor(config: Omit<CsvReaderConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected async parseContent(content: Buffer): Promise<CampaignRecord[]> {
    let parsed: unknown;
    try {
      parsed = parse(this.decode(content), {
        columns: false, // Parse rows first so headers can be checked before use
        delimiter: this.config.delimiter ?? ',',
        quote: this.config.quote ?? '"',
        skip_empty_lines: true,
        trim: true,
        cast: true, // Numbers come through as numbers
        cast_date: false,
        relax_column_count: true,
      });
    } catch (error) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Invalid CSV in ${this.config.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        suggestion: 'Check quoting and delimiters in the uploaded file.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const rows = toRows(parsed);
    const [headerRow, ...dataRows] = rows;
    if (!headerRow) return [];

    const headers = headerRow.map((h) => (h === null || h === undefined ? '' : String(h)));
    this.assertSafeHeaders(headers, 'CSV');

    return dataRows
      .map((row) => rowToRecord(headers, row, this.nestDottedColumns))
      .filter((record) => Object.keys(record).length > 0);
  }
}

/**
 * Factory function to create a CSV reader
 */
export function createCsvReader(config: Omit<CsvReaderConfig, 'type'>): CsvCampaignReader {
  return new CsvCampaignReader(config);
}
