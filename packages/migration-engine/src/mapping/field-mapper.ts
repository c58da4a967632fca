/**
 * FieldMapper
 *
 * Builds the canonical target record from a validated source record by
 * walking the mapping rules, so every target field is considered even when
 * the source never mentions it.
 */

import type { CampaignRecord, MappingRule, PlatformSchema } from '@adshift/core';
import { hasOwnField } from '@adshift/core';
import { MigrationError } from '../errors/index.js';
import type { MappingResult } from '../types/index.js';
import { castValue } from './coercion.js';

function copyValue(value: unknown): unknown {
  return typeof value === 'object' && value !== null ? structuredClone(value) : value;
}

export class FieldMapper {
  /**
   * Map a source record using a schema's mapping rules
   */
  map(source: CampaignRecord, schema: PlatformSchema | readonly MappingRule[]): MappingResult {
    const rules = 'mapping' in schema ? schema.mapping : schema;
    const record: CampaignRecord = {};
    const warnings: string[] = [];
    const missingFields: string[] = [];

    for (const rule of rules) {
      const outcome = this.mapField(source, rule);

      if (outcome.kind === 'value') {
        record[rule.targetField] = outcome.value;
      } else if (outcome.kind === 'cast_failed') {
        warnings.push(outcome.warning);
      } else {
        missingFields.push(rule.targetField);
      }

      if (rule.warning) {
        warnings.push(rule.warning);
      }
    }

    return { record, warnings, missingFields };
  }

  /**
   * Resolve a single target field
   */
  mapField(
    source: CampaignRecord,
    rule: MappingRule
  ):
    | { kind: 'value'; value: unknown }
    | { kind: 'cast_failed'; warning: string }
    | { kind: 'missing' } {
    let value: unknown =
      rule.sourceField !== undefined && hasOwnField(source, rule.sourceField)
        ? source[rule.sourceField]
        : null;

    if (rule.transform) {
      value = rule.transform.apply(value);
    }

    if (value !== null && value !== undefined) {
      try {
        return { kind: 'value', value: copyValue(castValue(value, rule.fieldType, rule.targetField)) };
      } catch (error) {
        if (error instanceof MigrationError && error.code === 'MAPPING_CAST_ERROR') {
          return { kind: 'cast_failed', warning: error.message };
        }
        throw error;
      }
    }

    if (rule.defaultValue !== undefined) {
      return { kind: 'value', value: copyValue(rule.defaultValue) };
    }

    return { kind: 'missing' };
  }
}
