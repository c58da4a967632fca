export { SchemaRegistry, DEFAULT_SCHEMA_DIR } from './schema-registry.js';
export type { SchemaRegistryOptions } from './schema-registry.js';
export { compilePlatformSchema } from './schema-compiler.js';
export { resolveTransform, isTransformName, TRANSFORM_NAMES } from './transforms.js';
export type { TransformName } from './transforms.js';
