export { FieldMapper } from './field-mapper.js';
export { castValue } from './coercion.js';
export { applyOverrides } from './overrides.js';
