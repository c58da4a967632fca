/**
 * @adshift/migration-engine
 *
 * Schema-driven migration of advertising campaigns between platforms
 */

// Engine
export { MigrationEngine } from './engine.js';
export type { MigrationEngineOptions } from './engine.js';
export { createMigrationEngine } from './runtime.js';
export type { CreateEngineOptions } from './runtime.js';

// Configuration
export {
  ConfigError,
  engineConfigSchema,
  sourceEntrySchema,
  expandEnvVars,
  formatConfigError,
  loadConfig,
  parseConfig,
} from './config.js';
export type { EngineConfig, EnvExpansionOptions, SourceEntry } from './config.js';

// Building blocks
export * from './errors/index.js';
export * from './types/index.js';
export * from './schema/index.js';
export * from './validation/index.js';
export * from './mapping/index.js';
export * from './migration/index.js';
export * from './formatters/index.js';
