/**
 * Schema types for describing source records and their mapping onto a target platform.
 *
 * Both rule sets are loaded from declarative definitions and are immutable
 * afterwards; see the zod document schemas in ../validation for the wire format.
 */

export type FieldType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'object'
  | 'array';

interface FieldDefinitionBase {
  name: string;
  required: boolean;
  description: string;
  /** Example value for sample records */
  example?: unknown;
}

export interface StringFieldDefinition extends FieldDefinitionBase {
  type: 'string';
  allowedValues?: readonly string[];
}

export interface NumericFieldDefinition extends FieldDefinitionBase {
  type: 'number' | 'integer';
  /** Inclusive lower bound */
  min?: number;
  /** Inclusive upper bound */
  max?: number;
  allowedValues?: readonly number[];
}

export interface BooleanFieldDefinition extends FieldDefinitionBase {
  type: 'boolean';
}

export interface ArrayFieldDefinition extends FieldDefinitionBase {
  type: 'array';
}

export interface ObjectFieldDefinition extends FieldDefinitionBase {
  type: 'object';
  /** Rules for keys of the nested object */
  nested?: ValidationSchema;
}

/** Validation rule for one source field, tagged by its type */
export type FieldDefinition =
  | StringFieldDefinition
  | NumericFieldDefinition
  | BooleanFieldDefinition
  | ArrayFieldDefinition
  | ObjectFieldDefinition;

/** Source field name to its validation rule, in definition order */
export type ValidationSchema = ReadonlyMap<string, FieldDefinition>;

/** Types a mapped target field can be cast to */
export type MappingFieldType = 'string' | 'integer' | 'float' | 'boolean';

/** A named transform resolved against the transform registry at load time */
export interface ResolvedTransform {
  readonly name: string;
  apply(value: unknown): unknown;
}

/** How to build one canonical target field */
export interface MappingRule {
  targetField: string;
  /** Dot-free key into the source record */
  sourceField?: string;
  defaultValue?: unknown;
  fieldType: MappingFieldType;
  transform?: ResolvedTransform;
  /** Static note attached whenever the field is processed (known lossy mapping) */
  warning?: string;
}

export interface PlatformSchema {
  /** Source platform identifier (facebook, twitter, ...) */
  platform: string;
  /** Version of the definition this schema was loaded from */
  version: string;
  /** Target platform the mapping produces records for */
  target: string;
  description?: string;
  /** Mapping rules in canonical field order */
  mapping: readonly MappingRule[];
  validation: ValidationSchema;
}
