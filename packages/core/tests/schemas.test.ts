import { describe, expect, it } from 'vitest';
import { formatZodIssues, platformSchemaDocumentSchema } from '../src/index.js';

const minimal = {
  platform: 'acme',
  version: '1.0.0',
  target: 'taboola',
  mapping: { name: { source_field: 'title' } },
  validation: {
    title: { field_type: 'string', required: true },
    budget: { field_type: 'number', min_value: 1, max_value: 10 },
    targeting: {
      field_type: 'object',
      nested_schema: { geo: { field_type: 'string' } },
    },
  },
};

describe('platformSchemaDocumentSchema', () => {
  it('accepts a well-formed definition and defaults the cast type to string', () => {
    const parsed = platformSchemaDocumentSchema.parse(minimal);
    expect(parsed.mapping.name?.field_type).toBe('string');
    expect(parsed.mapping.name?.source_field).toBe('title');
  });

  it('rejects bounds on a string field', () => {
    const result = platformSchemaDocumentSchema.safeParse({
      ...minimal,
      validation: { title: { field_type: 'string', min_value: 3 } },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toContain('- validation.title:');
    }
  });

  it('rejects a nested schema on an array field', () => {
    const result = platformSchemaDocumentSchema.safeParse({
      ...minimal,
      validation: { tags: { field_type: 'array', nested_schema: {} } },
    });
    expect(result.success).toBe(false);
  });

  it('rejects unknown field types', () => {
    const result = platformSchemaDocumentSchema.safeParse({
      ...minimal,
      validation: { start: { field_type: 'date' } },
    });
    expect(result.success).toBe(false);
  });

  it('rejects dotted source fields and uppercase platform ids', () => {
    expect(
      platformSchemaDocumentSchema.safeParse({
        ...minimal,
        mapping: { geo: { source_field: 'targeting.geo' } },
      }).success
    ).toBe(false);
    expect(platformSchemaDocumentSchema.safeParse({ ...minimal, platform: 'Acme' }).success).toBe(
      false
    );
  });

  it('rejects an empty mapping', () => {
    expect(platformSchemaDocumentSchema.safeParse({ ...minimal, mapping: {} }).success).toBe(false);
  });

  it('rejects reserved field names', () => {
    const definition: unknown = JSON.parse(
      '{"platform":"acme","version":"1","target":"taboola",' +
        '"mapping":{"name":{}},"validation":{"__proto__":{"field_type":"string"}}}'
    );
    expect(platformSchemaDocumentSchema.safeParse(definition).success).toBe(false);
  });
});
