export {
  isPlainObject,
  hasOwnField,
  describeValueType,
  formatValue,
  parseDecimal,
  cloneRecord,
  setNestedValue,
} from './records.js';
