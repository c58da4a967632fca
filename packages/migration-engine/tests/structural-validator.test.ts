import { describe, expect, it } from 'vitest';
import type { FieldDefinition, ValidationSchema } from '@adshift/core';
import { StructuralValidator } from '../src/index.js';

const targeting: ValidationSchema = new Map<string, FieldDefinition>([
  ['geo', { name: 'geo', type: 'string', required: false, description: 'Geographic targeting' }],
  [
    'age_min',
    { name: 'age_min', type: 'integer', required: false, description: 'Minimum age', min: 13, max: 65 },
  ],
]);

const schema: ValidationSchema = new Map<string, FieldDefinition>([
  ['name', { name: 'name', type: 'string', required: true, description: 'Campaign name' }],
  [
    'objective',
    {
      name: 'objective',
      type: 'string',
      required: true,
      description: 'Campaign objective',
      allowedValues: ['LINK_CLICKS', 'REACH'],
    },
  ],
  [
    'daily_budget',
    { name: 'daily_budget', type: 'number', required: true, description: '', min: 100 },
  ],
  [
    'priority',
    {
      name: 'priority',
      type: 'integer',
      required: false,
      description: 'Priority',
      max: 3,
      allowedValues: [1, 2, 3],
    },
  ],
  ['active', { name: 'active', type: 'boolean', required: false, description: '' }],
  ['targeting', { name: 'targeting', type: 'object', required: false, description: '', nested: targeting }],
]);

const valid = { name: 'Spring Sale', objective: 'REACH', daily_budget: 2000 };

describe('StructuralValidator', () => {
  const validator = new StructuralValidator();

  it('accepts a conforming record', () => {
    expect(validator.validate({ ...valid, active: true, priority: 2 }, schema, 0)).toEqual([]);
  });

  it('reports a missing required field and nothing else for it', () => {
    const { name: _omitted, ...record } = valid;

    expect(validator.validate(record, schema, 0)).toEqual([
      {
        campaignIndex: 0,
        fieldPath: 'name',
        issueType: 'missing_required_field',
        expected: "Required field 'name'",
        actual: 'Missing',
        description: 'Missing required field: name - Campaign name',
      },
    ]);
  });

  it('stops at a type mismatch', () => {
    const issues = validator.validate({ ...valid, daily_budget: '50' }, schema, 2);

    expect(issues).toEqual([
      {
        campaignIndex: 2,
        fieldPath: 'daily_budget',
        issueType: 'type_mismatch',
        expected: 'number',
        actual: 'string: 50',
        description: 'Expected number, got string',
      },
    ]);
  });

  it('treats null as a type mismatch', () => {
    const issues = validator.validate({ ...valid, name: null }, schema, 0);
    expect(issues.map((i) => [i.fieldPath, i.issueType, i.actual])).toEqual([
      ['name', 'type_mismatch', 'null: null'],
    ]);
  });

  it('requires integers to be integral', () => {
    const issues = validator.validate({ ...valid, priority: 2.5 }, schema, 0);
    expect(issues.map((i) => [i.issueType, i.expected, i.actual])).toEqual([
      ['type_mismatch', 'integer', 'number: 2.5'],
    ]);
  });

  it('checks bounds and allowed values independently', () => {
    const issues = validator.validate({ ...valid, priority: 5 }, schema, 0);

    expect(issues.map((i) => [i.issueType, i.expected, i.actual])).toEqual([
      ['value_too_large', '<= 3', '5'],
      ['invalid_value', 'One of: 1, 2, 3', '5'],
    ]);
  });

  it('flags values outside the allowed set', () => {
    const issues = validator.validate({ ...valid, objective: 'SALES' }, schema, 0);

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      issueType: 'invalid_value',
      expected: 'One of: LINK_CLICKS, REACH',
      actual: 'SALES',
    });
  });

  it('flags blank strings', () => {
    const issues = validator.validate({ ...valid, name: '   ' }, schema, 0);

    expect(issues).toEqual([
      {
        campaignIndex: 0,
        fieldPath: 'name',
        issueType: 'empty_string',
        expected: 'Non-empty string',
        actual: 'Empty string',
        description: "Field 'name' cannot be empty",
      },
    ]);
  });

  it('validates nested fields with a dotted path', () => {
    const issues = validator.validate(
      { ...valid, targeting: { geo: 'US', age_min: 10 } },
      schema,
      1
    );

    expect(issues).toEqual([
      {
        campaignIndex: 1,
        fieldPath: 'targeting.age_min',
        issueType: 'value_too_small',
        expected: '>= 13',
        actual: '10',
        description: 'Value 10 is below minimum 13',
      },
    ]);
  });

  it('reports fields the schema does not define', () => {
    const issues = validator.validate({ ...valid, color: 'red' }, schema, 0, 'facebook');

    expect(issues).toEqual([
      {
        campaignIndex: 0,
        fieldPath: 'color',
        issueType: 'unknown_field',
        expected: 'Field not in schema',
        actual: "Field 'color' with value: red",
        description: "Unknown field 'color' not defined in facebook schema",
      },
    ]);
  });

  it('produces frozen issues', () => {
    const [issue] = validator.validate({ ...valid, color: 'red' }, schema, 0);
    expect(Object.isFrozen(issue)).toBe(true);
  });
});
