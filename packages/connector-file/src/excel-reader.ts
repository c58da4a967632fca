/**
 * Excel campaign reader (.xlsx)
 */

import ExcelJS from 'exceljs';
import type { CampaignRecord } from '@adshift/core';
import { ConnectorError, formatValue } from '@adshift/core';
import { BaseCampaignFileReader, rowToRecord, type FileReaderConfig } from './base-file-reader.js';

export interface ExcelReaderConfig extends FileReaderConfig {
  type: 'excel';
  /** Sheet name or 1-based id (default: first sheet) */
  sheet?: string | number;
}

export function getCellValue(value: ExcelJS.CellValue): unknown {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value !== 'object') {
    return value;
  }

  // Formula results
  if ('result' in value) {
    return value.result instanceof Date ? value.result.toISOString() : (value.result ?? null);
  }

  if ('richText' in value) {
    return value.richText.map((rt) => rt.text).join('');
  }

  if ('hyperlink' in value) {
    return value.text;
  }

  // #N/A, #REF! and friends
  return null;
}

export class ExcelCampaignReader extends BaseCampaignFileReader<ExcelReaderConfig> {
  constructor(config: Omit<ExcelReaderConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async parseContent(_content: Buffer): Promise<CampaignRecord[]> {
    // ExcelJS reads the file itself
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.config.filePath);

    const sheet =
      this.config.sheet === undefined
        ? workbook.worksheets[0]
        : workbook.getWorksheet(this.config.sheet);

    if (!sheet) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        connectorId: this.config.id,
        suggestion: 'Check that the sheet name/index is correct.',
      });
    }

    const headers: string[] = [];
    sheet.getRow(1).eachCell({ includeEmpty: false }, (cell, colNumber) => {
      headers[colNumber - 1] = formatValue(getCellValue(cell.value));
    });
    // Fill holes left by empty header cells
    const headerList = Array.from(headers, (h) => h ?? '');
    this.assertSafeHeaders(headerList, 'Excel');

    const records: CampaignRecord[] = [];
    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber === 1) return;

      const cells: unknown[] = [];
      row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
        cells[colNumber - 1] = getCellValue(cell.value);
      });

      const record = rowToRecord(headerList, cells, this.nestDottedColumns);
      if (Object.keys(record).length > 0) {
        records.push(record);
      }
    });

    return records;
  }
}

/**
 * Factory function to create an Excel reader
 */
export function createExcelReader(config: Omit<ExcelReaderConfig, 'type'>): ExcelCampaignReader {
  return new ExcelCampaignReader(config);
}
