export { StructuralValidator } from './structural-validator.js';
export {
  BatchValidator,
  analyzeIssuePatterns,
  serializeIssue,
  serializeValidationSchema,
} from './batch-validator.js';
export { buildSampleRecord } from './sample-record.js';
