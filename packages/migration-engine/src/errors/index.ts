/**
 * Error exports for migration-engine
 */

export { MigrationError, errorKindOf, toMigrationError } from './migration-error.js';
export type {
  MigrationErrorCode,
  MigrationErrorDetails,
  ErrorKind,
} from './migration-error.js';
