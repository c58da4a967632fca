/**
 * StructuralValidator
 *
 * Checks a single record against a validation schema and collects every
 * issue instead of stopping at the first one.
 */

import type {
  CampaignRecord,
  FieldDefinition,
  FieldType,
  ValidationSchema,
} from '@adshift/core';
import { describeValueType, formatValue, hasOwnField, isPlainObject } from '@adshift/core';
import type { IssueType, ValidationIssue } from '../types/index.js';

function matchesType(value: unknown, type: FieldType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return isPlainObject(value);
    case 'array':
      return Array.isArray(value);
  }
}

export class StructuralValidator {
  /**
   * Validate one record
   *
   * @param index - position of the record in its batch, carried on every issue
   * @param schemaName - name used in unknown-field descriptions
   */
  validate(
    record: CampaignRecord,
    schema: ValidationSchema,
    index: number,
    schemaName = 'validation'
  ): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    for (const [fieldName, definition] of schema) {
      if (!hasOwnField(record, fieldName)) {
        if (definition.required) {
          const detail = definition.description ? ` - ${definition.description}` : '';
          issues.push(
            createIssue(index, fieldName, 'missing_required_field', {
              expected: `Required field '${fieldName}'`,
              actual: 'Missing',
              description: `Missing required field: ${fieldName}${detail}`,
            })
          );
        }
        continue;
      }

      issues.push(...this.validateValue(record[fieldName], definition, index, fieldName));
    }

    for (const [fieldName, value] of Object.entries(record)) {
      if (!schema.has(fieldName)) {
        issues.push(
          createIssue(index, fieldName, 'unknown_field', {
            expected: 'Field not in schema',
            actual: `Field '${fieldName}' with value: ${formatValue(value)}`,
            description: `Unknown field '${fieldName}' not defined in ${schemaName} schema`,
          })
        );
      }
    }

    return issues;
  }

  /**
   * Check a present value: type first, then bounds, allowed values,
   * emptiness and nested fields
   */
  validateValue(
    value: unknown,
    definition: FieldDefinition,
    index: number,
    fieldPath: string
  ): ValidationIssue[] {
    if (!matchesType(value, definition.type)) {
      const actualType = describeValueType(value);
      return [
        createIssue(index, fieldPath, 'type_mismatch', {
          expected: definition.type,
          actual: `${actualType}: ${formatValue(value)}`,
          description: `Expected ${definition.type}, got ${actualType}`,
        }),
      ];
    }

    const issues: ValidationIssue[] = [];

    switch (definition.type) {
      case 'number':
      case 'integer':
        if (typeof value === 'number') {
          if (definition.min !== undefined && value < definition.min) {
            issues.push(
              createIssue(index, fieldPath, 'value_too_small', {
                expected: `>= ${definition.min}`,
                actual: String(value),
                description: `Value ${value} is below minimum ${definition.min}`,
              })
            );
          }
          if (definition.max !== undefined && value > definition.max) {
            issues.push(
              createIssue(index, fieldPath, 'value_too_large', {
                expected: `<= ${definition.max}`,
                actual: String(value),
                description: `Value ${value} exceeds maximum ${definition.max}`,
              })
            );
          }
        }
        issues.push(...checkAllowedValues(value, definition.allowedValues, index, fieldPath));
        break;

      case 'string':
        issues.push(...checkAllowedValues(value, definition.allowedValues, index, fieldPath));
        if (typeof value === 'string' && value.trim() === '') {
          issues.push(
            createIssue(index, fieldPath, 'empty_string', {
              expected: 'Non-empty string',
              actual: 'Empty string',
              description: `Field '${fieldPath}' cannot be empty`,
            })
          );
        }
        break;

      case 'object':
        if (definition.nested && isPlainObject(value)) {
          for (const [nestedName, nestedDefinition] of definition.nested) {
            if (hasOwnField(value, nestedName)) {
              issues.push(
                ...this.validateValue(
                  value[nestedName],
                  nestedDefinition,
                  index,
                  `${fieldPath}.${nestedName}`
                )
              );
            }
          }
        }
        break;

      case 'boolean':
      case 'array':
        break;
    }

    return issues;
  }
}

function checkAllowedValues(
  value: unknown,
  allowedValues: readonly (string | number)[] | undefined,
  index: number,
  fieldPath: string
): ValidationIssue[] {
  if (!allowedValues || allowedValues.some((allowed) => allowed === value)) {
    return [];
  }

  const listed = allowedValues.join(', ');
  return [
    createIssue(index, fieldPath, 'invalid_value', {
      expected: `One of: ${listed}`,
      actual: formatValue(value),
      description: `Value '${formatValue(value)}' not in allowed values: ${listed}`,
    }),
  ];
}

function createIssue(
  campaignIndex: number,
  fieldPath: string,
  issueType: IssueType,
  detail: Pick<ValidationIssue, 'expected' | 'actual' | 'description'>
): ValidationIssue {
  return Object.freeze({ campaignIndex, fieldPath, issueType, ...detail });
}
