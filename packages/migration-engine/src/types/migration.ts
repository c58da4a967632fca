/**
 * Migration Types
 */

import type { ErrorKind } from '../errors/index.js';
import type { ValidationIssue } from './validation.js';

export type MigrationStage =
  | 'FETCHING'
  | 'VALIDATING'
  | 'MAPPING'
  | 'OVERRIDING'
  | 'UPLOADING'
  | 'DONE'
  | 'FAILED';

export interface StageTransition {
  /** 0-based record index within the invocation */
  recordIndex: number;
  from?: MigrationStage;
  to: MigrationStage;
}

export type OutcomeStatus = 'success' | 'warning' | 'failure';

/** The single terminal outcome of one record */
export interface RecordOutcome {
  recordIndex: number;
  campaignName: string;
  status: OutcomeStatus;
  /** Stage the record ended in, DONE or FAILED */
  stage: 'DONE' | 'FAILED';
  /** Stage that was running when the record failed */
  failedStage?: MigrationStage;
  /** Id assigned by the target platform */
  targetId?: string;
  errorKind?: ErrorKind;
  /** What to do about a failure, when the error suggested something */
  suggestion?: string;
  issues?: ValidationIssue[];
}

export interface ReportFailure {
  message: string;
  errorKind: ErrorKind;
}

/** Manual corrections applied after mapping; null deletes a field */
export type FieldOverrides = Record<string, unknown>;
