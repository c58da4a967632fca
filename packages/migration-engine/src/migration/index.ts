export { MigrationReport } from './migration-report.js';
export { MigrationOrchestrator } from './migration-orchestrator.js';
export type {
  MigrationOrchestratorOptions,
  BatchMigrationOptions,
} from './migration-orchestrator.js';
export { ClientSourceAdapter, AdapterRegistry } from './source-adapter.js';
export type { SourceAdapter } from './source-adapter.js';
export { runBounded } from './worker-pool.js';
