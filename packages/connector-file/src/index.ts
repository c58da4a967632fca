/**
 * @adshift/connector-file
 *
 * Readers for uploaded campaign files (CSV, Excel, JSON)
 */

export { BaseCampaignFileReader, rowToRecord } from './base-file-reader.js';
export type { FileReaderConfig } from './base-file-reader.js';

export { CsvCampaignReader, createCsvReader } from './csv-reader.js';
export type { CsvReaderConfig } from './csv-reader.js';

export { JsonCampaignReader, createJsonReader } from './json-reader.js';
export type { JsonReaderConfig } from './json-reader.js';

export { ExcelCampaignReader, createExcelReader } from './excel-reader.js';
export type { ExcelReaderConfig } from './excel-reader.js';

export { loadCampaignFile, detectCampaignFileFormat } from './load-campaign-file.js';
export type { CampaignFileFormat, LoadCampaignFileOptions } from './load-campaign-file.js';
