export { formatMigrationError, formatMigrationReport } from './report-formatter.js';
export type { ReportFormatOptions } from './report-formatter.js';
export { formatValidationAnalysis, formatQuickFixes } from './issue-formatter.js';
export { humanizeKey, listWithOverflow } from './utils.js';
