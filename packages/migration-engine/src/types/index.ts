/**
 * Type exports for migration-engine
 */

export type {
  IssueType,
  ValidationIssue,
  SerializedIssue,
  IssuePatterns,
  BatchValidationResult,
  ComparisonSummary,
  SerializedFieldDefinition,
} from './validation.js';
export type { MappingResult } from './mapping.js';
export type {
  MigrationStage,
  StageTransition,
  OutcomeStatus,
  RecordOutcome,
  ReportFailure,
  FieldOverrides,
} from './migration.js';
