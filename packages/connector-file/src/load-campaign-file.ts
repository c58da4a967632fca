/**
 * Pick a reader by file extension and read the campaigns in an upload
 */

import { basename, extname } from 'node:path';
import type { CampaignRecord } from '@adshift/core';
import { ConnectorError } from '@adshift/core';
import { createCsvReader } from './csv-reader.js';
import { createExcelReader } from './excel-reader.js';
import { createJsonReader } from './json-reader.js';

export type CampaignFileFormat = 'csv' | 'json' | 'excel';

export interface LoadCampaignFileOptions {
  /** Force a format instead of going by extension */
  format?: CampaignFileFormat;
  encoding?: BufferEncoding;
  nestDottedColumns?: boolean;
  /** CSV only */
  delimiter?: string;
  /** JSON only */
  recordsPath?: string;
  /** Excel only */
  sheet?: string | number;
}

const EXTENSION_FORMATS: ReadonlyMap<string, CampaignFileFormat> = new Map([
  ['.csv', 'csv'],
  ['.json', 'json'],
  ['.xlsx', 'excel'],
]);

export function detectCampaignFileFormat(filePath: string): CampaignFileFormat | undefined {
  return EXTENSION_FORMATS.get(extname(filePath).toLowerCase());
}

/**
 * @throws ConnectorError UNSUPPORTED_OPERATION for unknown file types
 */
export async function loadCampaignFile(
  filePath: string,
  options: LoadCampaignFileOptions = {}
): Promise<CampaignRecord[]> {
  const format = options.format ?? detectCampaignFileFormat(filePath);
  const base = {
    id: `file:${basename(filePath)}`,
    name: basename(filePath),
    filePath,
    encoding: options.encoding,
    nestDottedColumns: options.nestDottedColumns,
  };

  switch (format) {
    case 'csv':
      return createCsvReader({ ...base, delimiter: options.delimiter }).read();
    case 'json':
      return createJsonReader({ ...base, recordsPath: options.recordsPath }).read();
    case 'excel':
      return createExcelReader({ ...base, sheet: options.sheet }).read();
    default:
      throw new ConnectorError({
        code: 'UNSUPPORTED_OPERATION',
        message: `Unsupported campaign file type: ${extname(filePath) || filePath}`,
        connectorId: base.id,
        suggestion: `Upload one of: ${Array.from(EXTENSION_FORMATS.keys()).join(', ')}`,
      });
  }
}
