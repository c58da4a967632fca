/**
 * Casting of mapped values to a rule's declared field type
 */

import type { MappingFieldType } from '@adshift/core';
import { describeValueType, formatValue, parseDecimal } from '@adshift/core';
import { MigrationError } from '../errors/index.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const TRUE_STRINGS = new Set(['true', 'yes', '1']);
const FALSE_STRINGS = new Set(['false', 'no', '0']);

function castInteger(value: unknown): unknown {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error(`cannot convert ${value} to integer`);
    }
    return Math.trunc(value);
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  if (typeof value === 'string') {
    throw new Error(`invalid literal for integer: '${value}'`);
  }
  throw new Error(`${describeValueType(value)} is not a number`);
}

function castFloat(value: unknown): unknown {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error(`cannot convert ${value} to float`);
    }
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const parsed = parseDecimal(value);
    if (parsed === undefined) {
      throw new Error(`could not convert string to float: '${value}'`);
    }
    return parsed;
  }
  throw new Error(`${describeValueType(value)} is not a number`);
}

function castBoolean(value: unknown): unknown {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 0 || value === 1) {
    return value === 1;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(normalized)) return true;
    if (FALSE_STRINGS.has(normalized)) return false;
  }
  throw new Error(`'${formatValue(value)}' is not a recognised boolean`);
}

/**
 * Cast a non-null value to the declared type; strings pass through unchanged
 * @throws MigrationError MAPPING_CAST_ERROR naming the field and the type
 */
export function castValue(value: unknown, fieldType: MappingFieldType, field: string): unknown {
  try {
    switch (fieldType) {
      case 'integer':
        return castInteger(value);
      case 'float':
        return castFloat(value);
      case 'boolean':
        return castBoolean(value);
      case 'string':
        return value;
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MigrationError({
      code: 'MAPPING_CAST_ERROR',
      message: `Could not cast ${field} to ${fieldType}: ${reason}`,
      context: { field, fieldType, value },
    });
  }
}
