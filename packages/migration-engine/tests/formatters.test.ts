import { describe, expect, it } from 'vitest';
import { ConnectorError } from '@adshift/core';
import {
  MigrationError,
  MigrationReport,
  formatMigrationError,
  formatMigrationReport,
  formatQuickFixes,
  formatValidationAnalysis,
  humanizeKey,
  listWithOverflow,
  type ComparisonSummary,
  type ValidationIssue,
} from '../src/index.js';

function issue(
  campaignIndex: number,
  fieldPath: string,
  issueType: ValidationIssue['issueType'],
  description: string
): ValidationIssue {
  return { campaignIndex, fieldPath, issueType, expected: '', actual: '', description };
}

function summaryOf(issues: ValidationIssue[], totalCampaigns: number): ComparisonSummary {
  return {
    platform: 'facebook',
    schemaVersion: '1.0.0',
    totalCampaigns,
    totalIssues: issues.length,
    expectedSchema: {},
    validationIssues: issues.map((i) => ({ ...i, campaignNumber: i.campaignIndex + 1 })),
    sampleData: [],
    issuePatterns: { mostCommonIssues: {}, affectedFields: {}, issueTypes: {} },
  };
}

describe('formatter utils', () => {
  it('humanizes snake_case keys', () => {
    expect(humanizeKey('missing_required_field')).toBe('Missing Required Field');
  });

  it('adds an overflow line past the limit', () => {
    expect(listWithOverflow(['a', 'b', 'c'], 2)).toEqual(['- a', '- b', '- ... and 1 more']);
    expect(listWithOverflow(['a'], 2)).toEqual(['- a']);
  });
});

describe('formatMigrationReport', () => {
  it('renders every section with outcomes in record order', () => {
    const report = new MigrationReport();
    report.addWarning("Campaign 'A': check branding");
    report.addFailure("Failed to migrate campaign 'B': rejected", 'UploadRejected');
    report.addSuccess("Campaign 'A' created in taboola with ID 't_1'");
    report.addOutcome({
      recordIndex: 1,
      campaignName: 'B',
      status: 'failure',
      stage: 'FAILED',
      failedStage: 'UPLOADING',
      errorKind: 'UploadRejected',
    });
    report.addOutcome({
      recordIndex: 0,
      campaignName: 'A',
      status: 'warning',
      stage: 'DONE',
      targetId: 't_1',
    });

    expect(formatMigrationReport(report)).toBe(
      [
        '## Migration Report',
        '',
        '### Summary',
        '- Successes: 1',
        '- Warnings: 1',
        '- Failures: 1',
        '',
        '### Successes (1)',
        "- Campaign 'A' created in taboola with ID 't_1'",
        '',
        '### Warnings (1)',
        "- Campaign 'A': check branding",
        '',
        '### Failures (1)',
        "- Failed to migrate campaign 'B': rejected (UploadRejected)",
        '',
        '### Campaigns',
        '- #1 A: warning, created as t_1',
        '- #2 B: failed at UPLOADING: UploadRejected',
      ].join('\n')
    );
  });

  it('renders only the summary for an empty report', () => {
    expect(formatMigrationReport(new MigrationReport())).toBe(
      ['## Migration Report', '', '### Summary', '- Successes: 0', '- Warnings: 0', '- Failures: 0'].join(
        '\n'
      )
    );
  });

  it('caps long sections and can leave outcomes out', () => {
    const report = new MigrationReport();
    report.addWarning('w1');
    report.addWarning('w2');
    report.addWarning('w3');
    report.addOutcome({ recordIndex: 0, campaignName: 'A', status: 'success', stage: 'DONE' });

    const text = formatMigrationReport(report, { maxEntries: 1, includeOutcomes: false });

    expect(text.split('\n').slice(-3)).toEqual(['### Warnings (3)', '- w1', '- ... and 2 more']);
  });
});

describe('formatMigrationReport suggestions', () => {
  it('adds the suggested action to failed campaigns', () => {
    const report = new MigrationReport();
    report.addOutcome({
      recordIndex: 0,
      campaignName: 'fb_missing',
      status: 'failure',
      stage: 'FAILED',
      failedStage: 'FETCHING',
      errorKind: 'FetchFailed',
      suggestion: 'Check the campaign ID in the source ads account.',
    });

    expect(formatMigrationReport(report).split('\n').slice(-1)).toEqual([
      '- #1 fb_missing: failed at FETCHING: FetchFailed. Suggested action: Check the campaign ID in the source ads account.',
    ]);
  });
});

describe('formatMigrationError', () => {
  it('renders a migration error with its suggestion', () => {
    const error = new MigrationError({
      code: 'ADAPTER_NOT_FOUND',
      message: "Migration from 'myspace' is not supported",
      suggestion: 'Supported platforms: facebook, twitter',
    });

    expect(formatMigrationError(error)).toBe(
      "Error [ADAPTER_NOT_FOUND]: Migration from 'myspace' is not supported\n" +
        'Suggested action: Supported platforms: facebook, twitter'
    );
  });

  it('files an unreadable upload as a fetch failure', () => {
    const error = new ConnectorError({
      code: 'NOT_FOUND',
      message: 'File not found: /uploads/campaigns.csv',
      suggestion: 'Check the upload path.',
    });

    expect(formatMigrationError(error)).toBe(
      'Error [FETCH_FAILED]: File not found: /uploads/campaigns.csv\n' +
        'Suggested action: Check the upload path.'
    );
  });

  it('renders anything else as unexpected', () => {
    expect(formatMigrationError(new Error('disk full'))).toBe('Error [UNEXPECTED_ERROR]: disk full');
  });
});

describe('formatValidationAnalysis', () => {
  it('confirms a clean batch', () => {
    expect(formatValidationAnalysis(summaryOf([], 4))).toBe(
      '## Validation Analysis for FACEBOOK Campaigns\n\nAll 4 campaigns match the expected schema.'
    );
  });

  it('groups issues by type and lists next steps', () => {
    const text = formatValidationAnalysis(
      summaryOf(
        [
          issue(0, 'name', 'missing_required_field', "Required field 'name' is missing"),
          issue(1, 'daily_budget', 'value_too_small', 'Value 50 is below the minimum 100'),
          issue(2, 'name', 'missing_required_field', "Required field 'name' is missing"),
        ],
        3
      )
    );

    expect(text).toBe(
      [
        '## Validation Analysis for FACEBOOK Campaigns',
        '',
        'Found 3 validation issues that need attention.',
        '',
        '### Issues by Type',
        '',
        '**Missing Required Field** (2 issues):',
        "- Campaign #1: Required field 'name' is missing",
        "- Campaign #3: Required field 'name' is missing",
        '',
        '**Value Too Small** (1 issues):',
        '- Campaign #2: Value 50 is below the minimum 100',
        '',
        '### Recommended Actions',
        '1. Review the expected schema requirements',
        '2. Fix the issues mentioned above',
        '3. Re-upload your corrected file',
        '4. Or proceed with valid campaigns if any exist',
      ].join('\n')
    );
  });
});

describe('formatQuickFixes', () => {
  it('suggests one fix per kind of issue present', () => {
    const text = formatQuickFixes([
      issue(0, 'name', 'missing_required_field', ''),
      issue(1, 'name', 'missing_required_field', ''),
      issue(1, 'objective', 'missing_required_field', ''),
      issue(2, 'daily_budget', 'type_mismatch', ''),
      issue(3, 'color', 'unknown_field', ''),
    ]);

    expect(text).toBe(
      [
        '**Quick Fixes:**',
        '- Add missing required fields: name, objective',
        '- Fix data type mismatches: numbers must not be quoted',
        '- Remove or rename columns the platform does not know',
      ].join('\n')
    );
  });

  it('says so when nothing applies', () => {
    expect(formatQuickFixes([issue(0, 'name', 'empty_string', '')])).toBe(
      'No specific fixes available.'
    );
  });
});
