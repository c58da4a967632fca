/**
 * Compiles a parsed definition document into the immutable rule objects the
 * validator and mapper work with.
 */

import type {
  FieldDefinition,
  FieldDefinitionDocument,
  MappingRule,
  PlatformSchema,
  PlatformSchemaDocument,
  ValidationSchema,
} from '@adshift/core';
import { MigrationError } from '../errors/index.js';
import { resolveTransform, TRANSFORM_NAMES } from './transforms.js';

/**
 * Freeze a value and everything reachable from it
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Read-only view of compiled field rules. The backing map stays private, so
 * a loaded schema offers no `set`, `delete` or `clear`.
 */
class FrozenValidationSchema implements ReadonlyMap<string, FieldDefinition> {
  readonly #fields: Map<string, FieldDefinition>;

  constructor(fields: Map<string, FieldDefinition>) {
    this.#fields = fields;
    Object.freeze(this);
  }

  get size(): number {
    return this.#fields.size;
  }

  get(name: string): FieldDefinition | undefined {
    return this.#fields.get(name);
  }

  has(name: string): boolean {
    return this.#fields.has(name);
  }

  forEach(
    callback: (
      definition: FieldDefinition,
      name: string,
      schema: ReadonlyMap<string, FieldDefinition>
    ) => void,
    thisArg?: unknown
  ): void {
    this.#fields.forEach((definition, name) => callback.call(thisArg, definition, name, this));
  }

  entries() {
    return this.#fields.entries();
  }

  keys() {
    return this.#fields.keys();
  }

  values() {
    return this.#fields.values();
  }

  [Symbol.iterator]() {
    return this.#fields[Symbol.iterator]();
  }
}

function compileField(
  name: string,
  doc: FieldDefinitionDocument,
  path: string,
  problems: string[]
): FieldDefinition {
  const base = {
    name,
    required: doc.required ?? true,
    description: doc.description ?? '',
    ...(doc.example !== undefined ? { example: doc.example } : {}),
  };

  switch (doc.field_type) {
    case 'string':
      return { ...base, type: 'string', allowedValues: doc.allowed_values };
    case 'number':
    case 'integer':
      if (
        doc.min_value !== undefined &&
        doc.max_value !== undefined &&
        doc.min_value > doc.max_value
      ) {
        problems.push(`- ${path}: min_value ${doc.min_value} exceeds max_value ${doc.max_value}`);
      }
      return {
        ...base,
        type: doc.field_type,
        min: doc.min_value,
        max: doc.max_value,
        allowedValues: doc.allowed_values,
      };
    case 'boolean':
      return { ...base, type: 'boolean' };
    case 'array':
      return { ...base, type: 'array' };
    case 'object':
      return {
        ...base,
        type: 'object',
        nested: doc.nested_schema
          ? compileValidation(doc.nested_schema, `${path}.nested_schema`, problems)
          : undefined,
      };
  }
}

function compileValidation(
  fields: { [name: string]: FieldDefinitionDocument },
  path: string,
  problems: string[]
): ValidationSchema {
  const compiled = new Map<string, FieldDefinition>();
  for (const [name, doc] of Object.entries(fields)) {
    compiled.set(name, deepFreeze(compileField(name, doc, `${path}.${name}`, problems)));
  }
  return new FrozenValidationSchema(compiled);
}

function compileMapping(doc: PlatformSchemaDocument, problems: string[]): MappingRule[] {
  const rules: MappingRule[] = [];

  for (const [targetField, ruleDoc] of Object.entries(doc.mapping)) {
    const rule: MappingRule = { targetField, fieldType: ruleDoc.field_type };

    if (ruleDoc.source_field) rule.sourceField = ruleDoc.source_field;
    if (ruleDoc.default !== undefined && ruleDoc.default !== null) {
      rule.defaultValue = ruleDoc.default;
    }
    if (ruleDoc.warning) rule.warning = ruleDoc.warning;

    if (ruleDoc.transform) {
      const transform = resolveTransform(ruleDoc.transform);
      if (transform) {
        rule.transform = transform;
      } else {
        problems.push(
          `- mapping.${targetField}.transform: unknown transform '${ruleDoc.transform}' ` +
            `(known: ${TRANSFORM_NAMES.join(', ')})`
        );
      }
    }

    rules.push(deepFreeze(rule));
  }

  return rules;
}

/**
 * Build a PlatformSchema from a document that already passed zod parsing
 * @throws MigrationError SCHEMA_LOAD_ERROR listing every semantic problem
 */
export function compilePlatformSchema(doc: PlatformSchemaDocument, source: string): PlatformSchema {
  const problems: string[] = [];
  const mapping = compileMapping(doc, problems);
  const validation = compileValidation(doc.validation, 'validation', problems);

  if (problems.length > 0) {
    throw new MigrationError({
      code: 'SCHEMA_LOAD_ERROR',
      message: `Invalid schema definition for '${doc.platform}' (${source}):\n${problems.join('\n')}`,
      suggestion: 'Fix the listed rules in the schema definition and reload.',
      context: { platform: doc.platform, source },
    });
  }

  return Object.freeze({
    platform: doc.platform,
    version: doc.version,
    target: doc.target,
    description: doc.description,
    mapping: Object.freeze(mapping),
    validation,
  });
}
