/**
 * BatchValidator
 *
 * Runs the structural validator over a batch, keeps the records that passed
 * and aggregates issue statistics for reporting.
 */

import type { CampaignRecord, PlatformSchema, ValidationSchema } from '@adshift/core';
import { Logger } from '@adshift/core';
import type { SchemaRegistry } from '../schema/index.js';
import type {
  BatchValidationResult,
  ComparisonSummary,
  IssuePatterns,
  SerializedFieldDefinition,
  SerializedIssue,
  ValidationIssue,
} from '../types/index.js';
import { StructuralValidator } from './structural-validator.js';

/** Records included as sample data in a comparison summary */
const SAMPLE_SIZE = 3;

export class BatchValidator {
  private readonly validator: StructuralValidator;
  private readonly logger: Logger;

  constructor(
    private readonly registry: SchemaRegistry,
    options: { validator?: StructuralValidator; logger?: Logger } = {}
  ) {
    this.validator = options.validator ?? new StructuralValidator();
    this.logger = (options.logger ?? new Logger({ level: 'warn' })).child({
      component: 'batch-validator',
    });
  }

  /**
   * Validate a batch against a platform's validation schema
   * @throws MigrationError SCHEMA_NOT_FOUND | SCHEMA_LOAD_ERROR
   */
  validateBatch(records: CampaignRecord[], platform: string): BatchValidationResult {
    return this.validateAgainst(records, this.registry.get(platform));
  }

  validateAgainst(records: CampaignRecord[], schema: PlatformSchema): BatchValidationResult {
    const validRecords: CampaignRecord[] = [];
    const validIndexes: number[] = [];
    const issues: ValidationIssue[] = [];

    records.forEach((record, index) => {
      const recordIssues = this.validator.validate(
        record,
        schema.validation,
        index,
        schema.platform
      );

      if (recordIssues.length === 0) {
        validRecords.push(record);
        validIndexes.push(index);
      } else {
        issues.push(...recordIssues);
      }
    });

    this.logger.info(
      `Validation complete: ${validRecords.length}/${records.length} campaigns valid, ${issues.length} issues found`,
      { platform: schema.platform }
    );

    return {
      validRecords,
      validIndexes,
      issues,
      summary: analyzeIssuePatterns(issues),
    };
  }

  /**
   * Build the diagnostic payload comparing a batch with its expected schema
   */
  buildComparisonSummary(
    records: CampaignRecord[],
    issues: ValidationIssue[],
    platform: string
  ): ComparisonSummary {
    const schema = this.registry.get(platform);

    return {
      platform: schema.platform,
      schemaVersion: schema.version,
      totalCampaigns: records.length,
      totalIssues: issues.length,
      expectedSchema: serializeValidationSchema(schema.validation),
      validationIssues: issues.map(serializeIssue),
      sampleData: records.slice(0, SAMPLE_SIZE),
      issuePatterns: analyzeIssuePatterns(issues),
    };
  }
}

/**
 * Count issues by field and type, by field, and by type
 */
export function analyzeIssuePatterns(issues: ValidationIssue[]): IssuePatterns {
  const patterns: IssuePatterns = {
    mostCommonIssues: {},
    affectedFields: {},
    issueTypes: {},
  };

  for (const issue of issues) {
    const issueKey = `${issue.fieldPath}:${issue.issueType}`;
    patterns.mostCommonIssues[issueKey] = (patterns.mostCommonIssues[issueKey] ?? 0) + 1;
    patterns.affectedFields[issue.fieldPath] = (patterns.affectedFields[issue.fieldPath] ?? 0) + 1;
    patterns.issueTypes[issue.issueType] = (patterns.issueTypes[issue.issueType] ?? 0) + 1;
  }

  return patterns;
}

export function serializeIssue(issue: ValidationIssue): SerializedIssue {
  return {
    campaignNumber: issue.campaignIndex + 1,
    campaignIndex: issue.campaignIndex,
    fieldPath: issue.fieldPath,
    issueType: issue.issueType,
    expected: issue.expected,
    actual: issue.actual,
    description: issue.description,
  };
}

export function serializeValidationSchema(
  schema: ValidationSchema
): Record<string, SerializedFieldDefinition> {
  const serialized: Record<string, SerializedFieldDefinition> = {};

  for (const [name, definition] of schema) {
    const entry: SerializedFieldDefinition = {
      type: definition.type,
      required: definition.required,
      description: definition.description,
    };

    if (definition.type === 'number' || definition.type === 'integer') {
      if (definition.min !== undefined) entry.min_value = definition.min;
      if (definition.max !== undefined) entry.max_value = definition.max;
    }
    if (
      (definition.type === 'string' ||
        definition.type === 'number' ||
        definition.type === 'integer') &&
      definition.allowedValues
    ) {
      entry.allowed_values = definition.allowedValues;
    }
    if (definition.type === 'object' && definition.nested) {
      entry.nested_schema = serializeValidationSchema(definition.nested);
    }

    serialized[name] = entry;
  }

  return serialized;
}
