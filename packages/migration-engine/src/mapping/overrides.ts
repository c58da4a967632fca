import type { CampaignRecord } from '@adshift/core';
import type { FieldOverrides } from '../types/index.js';

/**
 * Apply manual corrections to a mapped record, returning a new record.
 * A null override deletes the field; any other value replaces or adds it.
 */
export function applyOverrides(record: CampaignRecord, overrides: FieldOverrides): CampaignRecord {
  const fields = new Map(Object.entries(record));

  for (const [field, value] of Object.entries(overrides)) {
    if (value === null) {
      fields.delete(field);
    } else if (value !== undefined) {
      fields.set(field, value);
    }
  }

  return Object.fromEntries(fields);
}
