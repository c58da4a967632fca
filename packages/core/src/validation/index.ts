export {
  fieldTypeSchema,
  mappingFieldTypeSchema,
  fieldDefinitionDocumentSchema,
  mappingRuleDocumentSchema,
  platformSchemaDocumentSchema,
  formatZodIssues,
} from './schemas.js';
export type {
  FieldDefinitionDocument,
  MappingRuleDocument,
  PlatformSchemaDocument,
} from './schemas.js';
