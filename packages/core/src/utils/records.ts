/**
 * Utility functions for working with campaign records
 */

import type { CampaignRecord } from '../types/index.js';

const FORBIDDEN_PATH_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Own-property check that ignores inherited keys
 */
export function hasOwnField(record: object, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, field);
}

/**
 * Name of a value's runtime type as it shows up in issue reports
 */
export function describeValueType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'number';
  }
  if (isPlainObject(value)) return 'object';
  return typeof value;
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse a plain decimal number such as "12", "-0.5" or "1e3".
 * Hex, octal and binary literals are not numbers here.
 */
export function parseDecimal(text: string): number | undefined {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Render a value for a human-readable message
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  if (typeof value === 'object' && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

/**
 * Deep copy of a record so a pipeline stage never mutates its input
 */
export function cloneRecord(record: CampaignRecord): CampaignRecord {
  return structuredClone(record);
}

/**
 * Set a value at a dot-notation path, creating intermediate objects
 * @throws Error if a path segment would reach the prototype
 */
export function setNestedValue(record: CampaignRecord, path: string, value: unknown): void {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0 || FORBIDDEN_PATH_SEGMENTS.has(p))) {
    throw new Error(`Unsafe field path: "${path}"`);
  }

  let current: Record<string, unknown> = record;
  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i] ?? '';
    const next = hasOwnField(current, part) ? current[part] : undefined;

    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1] ?? path] = value;
}
