import type { CampaignRecord, ValidationSchema } from '@adshift/core';

/**
 * Example record assembled from the `example` values of a validation schema.
 * Objects without an example of their own are built from their nested schema;
 * fields with neither are left out.
 */
export function buildSampleRecord(schema: ValidationSchema): CampaignRecord {
  const sample: CampaignRecord = {};

  for (const [name, definition] of schema) {
    if (definition.example !== undefined) {
      sample[name] = structuredClone(definition.example);
    } else if (definition.type === 'object' && definition.nested) {
      const nested = buildSampleRecord(definition.nested);
      if (Object.keys(nested).length > 0) {
        sample[name] = nested;
      }
    }
  }

  return sample;
}
