/**
 * Validation Result Types
 *
 * Types for structural issues found while checking source records against a
 * platform's validation schema.
 */

import type { CampaignRecord, FieldType } from '@adshift/core';

export type IssueType =
  | 'missing_required_field'
  | 'type_mismatch'
  | 'value_too_small'
  | 'value_too_large'
  | 'invalid_value'
  | 'empty_string'
  | 'unknown_field';

/** A single structural defect in one record */
export interface ValidationIssue {
  /** 0-based position of the record in the submitted batch */
  readonly campaignIndex: number;
  /** Dot-joined path for nested fields */
  readonly fieldPath: string;
  readonly issueType: IssueType;
  readonly expected: string;
  readonly actual: string;
  readonly description: string;
}

/** Issue shape handed to reports, numbered from 1 for people */
export interface SerializedIssue extends ValidationIssue {
  campaignNumber: number;
}

/** Issue counts grouped three ways */
export interface IssuePatterns {
  /** Keyed by `fieldPath:issueType` */
  mostCommonIssues: Record<string, number>;
  affectedFields: Record<string, number>;
  issueTypes: Partial<Record<IssueType, number>>;
}

export interface BatchValidationResult {
  /** Records without issues, in input order */
  validRecords: CampaignRecord[];
  /** Batch indexes of the valid records */
  validIndexes: number[];
  issues: ValidationIssue[];
  summary: IssuePatterns;
}

export interface SerializedFieldDefinition {
  type: FieldType;
  required: boolean;
  description: string;
  min_value?: number;
  max_value?: number;
  allowed_values?: readonly (string | number)[];
  nested_schema?: Record<string, SerializedFieldDefinition>;
}

/** Diagnostic payload comparing a batch against its expected schema */
export interface ComparisonSummary {
  platform: string;
  schemaVersion: string;
  totalCampaigns: number;
  totalIssues: number;
  expectedSchema: Record<string, SerializedFieldDefinition>;
  validationIssues: SerializedIssue[];
  sampleData: CampaignRecord[];
  issuePatterns: IssuePatterns;
}
