export type { CampaignRecord } from './record.js';
export type {
  FieldType,
  FieldDefinition,
  StringFieldDefinition,
  NumericFieldDefinition,
  BooleanFieldDefinition,
  ArrayFieldDefinition,
  ObjectFieldDefinition,
  ValidationSchema,
  MappingFieldType,
  ResolvedTransform,
  MappingRule,
  PlatformSchema,
} from './schema.js';
