/**
 * Zod schemas for platform schema definition documents
 *
 * A definition document is the versioned JSON a platform's mapping and
 * validation rules are loaded from. Every object is strict, so a rule that
 * carries metadata its field type cannot use (bounds on a string, a nested
 * schema on an array) is rejected when the document is parsed.
 */

import { z } from 'zod';

const FORBIDDEN_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

const fieldKeySchema = z
  .string()
  .min(1)
  .refine((key) => !FORBIDDEN_KEYS.has(key), {
    message: 'Field name is reserved',
  });

/** Field type enum */
export const fieldTypeSchema = z.enum([
  'string',
  'number',
  'integer',
  'boolean',
  'object',
  'array',
]);

/** Mapping cast target enum */
export const mappingFieldTypeSchema = z.enum(['string', 'integer', 'float', 'boolean']);

interface FieldDocumentBase {
  required?: boolean;
  description?: string;
  example?: unknown;
}

/** Validation rule as written in a definition document */
export type FieldDefinitionDocument =
  | (FieldDocumentBase & { field_type: 'string'; allowed_values?: string[] })
  | (FieldDocumentBase & {
      field_type: 'number' | 'integer';
      min_value?: number;
      max_value?: number;
      allowed_values?: number[];
    })
  | (FieldDocumentBase & { field_type: 'boolean' })
  | (FieldDocumentBase & { field_type: 'array' })
  | (FieldDocumentBase & {
      field_type: 'object';
      nested_schema?: { [name: string]: FieldDefinitionDocument };
    });

const fieldDocumentBase = {
  required: z.boolean().optional(),
  description: z.string().optional(),
  example: z.unknown().optional(),
};

const numericBounds = {
  min_value: z.number().finite().optional(),
  max_value: z.number().finite().optional(),
  allowed_values: z.array(z.number().finite()).min(1).optional(),
};

/** Validation rule (recursive for nested objects) */
export const fieldDefinitionDocumentSchema: z.ZodType<FieldDefinitionDocument> = z.lazy(() =>
  z.discriminatedUnion('field_type', [
    z
      .object({
        ...fieldDocumentBase,
        field_type: z.literal('string'),
        allowed_values: z.array(z.string()).min(1).optional(),
      })
      .strict(),
    z
      .object({ ...fieldDocumentBase, ...numericBounds, field_type: z.literal('number') })
      .strict(),
    z
      .object({ ...fieldDocumentBase, ...numericBounds, field_type: z.literal('integer') })
      .strict(),
    z.object({ ...fieldDocumentBase, field_type: z.literal('boolean') }).strict(),
    z.object({ ...fieldDocumentBase, field_type: z.literal('array') }).strict(),
    z
      .object({
        ...fieldDocumentBase,
        field_type: z.literal('object'),
        nested_schema: z.record(fieldKeySchema, fieldDefinitionDocumentSchema).optional(),
      })
      .strict(),
  ])
);

/** Mapping rule for one canonical target field */
export const mappingRuleDocumentSchema = z
  .object({
    source_field: z
      .string()
      .min(1)
      .refine((key) => !key.includes('.'), {
        message: 'source_field must be a dot-free key',
      })
      .nullable()
      .optional(),
    default: z.unknown().optional(),
    field_type: mappingFieldTypeSchema.default('string'),
    transform: z.string().min(1).nullable().optional(),
    warning: z.string().min(1).nullable().optional(),
  })
  .strict();

/** Complete platform definition document */
export const platformSchemaDocumentSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    platform: z.string().regex(/^[a-z0-9_-]+$/, 'platform must be lowercase [a-z0-9_-]'),
    version: z.string().min(1),
    target: z.string().min(1),
    description: z.string().optional(),
    mapping: z
      .record(fieldKeySchema, mappingRuleDocumentSchema)
      .refine((mapping) => Object.keys(mapping).length > 0, {
        message: 'mapping must define at least one target field',
      }),
    validation: z.record(fieldKeySchema, fieldDefinitionDocumentSchema),
  })
  .strict();

/** Export types from schemas */
export type MappingRuleDocument = z.infer<typeof mappingRuleDocumentSchema>;
export type PlatformSchemaDocument = z.infer<typeof platformSchemaDocumentSchema>;

/**
 * Render zod issues as one "- path: message" line each
 */
export function formatZodIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
}
