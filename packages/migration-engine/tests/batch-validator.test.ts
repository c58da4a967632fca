import { describe, expect, it } from 'vitest';
import { BatchValidator, SchemaRegistry, analyzeIssuePatterns } from '../src/index.js';
import { silentLogger } from './helpers.js';

const registry = new SchemaRegistry({ logger: silentLogger });
const validator = new BatchValidator(registry, { logger: silentLogger });

const records = [
  { name: 'A', objective: 'LINK_CLICKS', daily_budget: 2000 },
  { name: 'B', objective: 'LINK_CLICKS', daily_budget: 50 },
  { objective: 'REACH', daily_budget: 'lots' },
  { name: 'D', objective: 'REACH', daily_budget: 100 },
];

describe('BatchValidator', () => {
  it('keeps valid records in input order', () => {
    const result = validator.validateBatch(records, 'facebook');

    expect(result.validRecords).toEqual([records[0], records[3]]);
    expect(result.validIndexes).toEqual([0, 3]);
    expect(result.issues.map((i) => [i.campaignIndex, i.fieldPath, i.issueType])).toEqual([
      [1, 'daily_budget', 'value_too_small'],
      [2, 'name', 'missing_required_field'],
      [2, 'daily_budget', 'type_mismatch'],
    ]);
  });

  it('summarises issues three ways', () => {
    const { summary } = validator.validateBatch(records, 'facebook');

    expect(summary).toEqual({
      mostCommonIssues: {
        'daily_budget:value_too_small': 1,
        'name:missing_required_field': 1,
        'daily_budget:type_mismatch': 1,
      },
      affectedFields: { daily_budget: 2, name: 1 },
      issueTypes: { value_too_small: 1, missing_required_field: 1, type_mismatch: 1 },
    });
  });

  it('returns an empty summary for a clean batch', () => {
    expect(analyzeIssuePatterns([])).toEqual({
      mostCommonIssues: {},
      affectedFields: {},
      issueTypes: {},
    });
  });

  it('builds a comparison summary numbered from 1', () => {
    const { issues } = validator.validateBatch(records, 'facebook');
    const summary = validator.buildComparisonSummary(records, issues, 'facebook');

    expect(summary.platform).toBe('facebook');
    expect(summary.schemaVersion).toBe('1.0.0');
    expect(summary.totalCampaigns).toBe(4);
    expect(summary.totalIssues).toBe(3);
    expect(summary.sampleData).toEqual(records.slice(0, 3));
    expect(summary.validationIssues.map((i) => [i.campaignIndex, i.campaignNumber])).toEqual([
      [1, 2],
      [2, 3],
      [2, 3],
    ]);
    expect(summary.expectedSchema.daily_budget).toEqual({
      type: 'number',
      required: true,
      description: 'Daily budget in cents',
      min_value: 100,
      max_value: 10000000,
    });
    expect(summary.expectedSchema.targeting?.nested_schema?.age_min).toEqual({
      type: 'integer',
      required: false,
      description: 'Minimum age',
      min_value: 13,
      max_value: 65,
    });
  });

  it('propagates unknown platforms', () => {
    expect(() => validator.validateBatch(records, 'myspace')).toThrow(
      "No schema definition found for platform 'myspace'"
    );
  });
});
