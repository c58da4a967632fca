/**
 * MigrationEngine
 *
 * Public surface of the migration engine: validation, mapping, single and
 * batch migration, file uploads and diagnostics, all driven by the platform
 * schemas held in one registry.
 */

import type { CampaignRecord, ICampaignSink } from '@adshift/core';
import { Logger } from '@adshift/core';
import { loadCampaignFile, type LoadCampaignFileOptions } from '@adshift/connector-file';
import { FieldMapper } from './mapping/index.js';
import {
  AdapterRegistry,
  MigrationOrchestrator,
  type BatchMigrationOptions,
  type MigrationReport,
} from './migration/index.js';
import type { SchemaRegistry } from './schema/index.js';
import type {
  BatchValidationResult,
  ComparisonSummary,
  FieldOverrides,
  MappingResult,
} from './types/index.js';
import { BatchValidator, StructuralValidator, buildSampleRecord } from './validation/index.js';

export interface MigrationEngineOptions {
  schemas: SchemaRegistry;
  adapters: AdapterRegistry;
  sink: ICampaignSink;
  logger?: Logger;
  validateBeforeMapping?: boolean;
  warnOnMissingFields?: boolean;
  concurrency?: number;
}

export class MigrationEngine {
  readonly schemas: SchemaRegistry;
  readonly adapters: AdapterRegistry;
  readonly sink: ICampaignSink;
  private readonly logger: Logger;
  private readonly orchestrator: MigrationOrchestrator;
  private readonly batchValidator: BatchValidator;
  private readonly mapper = new FieldMapper();

  constructor(options: MigrationEngineOptions) {
    this.schemas = options.schemas;
    this.adapters = options.adapters;
    this.sink = options.sink;
    this.logger = options.logger ?? new Logger({ level: 'warn' });

    const validator = new StructuralValidator();
    this.batchValidator = new BatchValidator(this.schemas, { validator, logger: this.logger });
    this.orchestrator = new MigrationOrchestrator({
      schemas: this.schemas,
      adapters: this.adapters,
      sink: this.sink,
      logger: this.logger,
      validateBeforeMapping: options.validateBeforeMapping,
      warnOnMissingFields: options.warnOnMissingFields,
      concurrency: options.concurrency,
    });
  }

  /**
   * Check a batch against a platform's validation schema
   * @throws MigrationError SCHEMA_NOT_FOUND | SCHEMA_LOAD_ERROR
   */
  validateBatch(records: CampaignRecord[], platform: string): BatchValidationResult {
    return this.batchValidator.validateBatch(records, platform);
  }

  /**
   * Map one source record to the target shape without uploading it
   * @throws MigrationError SCHEMA_NOT_FOUND | SCHEMA_LOAD_ERROR
   */
  mapRecord(record: CampaignRecord, platform: string): MappingResult {
    return this.mapper.map(record, this.schemas.get(platform));
  }

  migrateOne(
    platform: string,
    campaignId: string,
    overrides?: FieldOverrides
  ): Promise<MigrationReport> {
    return this.orchestrator.migrateOne(platform, campaignId, overrides);
  }

  /**
   * Migrate records already in memory; entries that are not objects fail
   * on their own
   */
  migrateBatch(
    platform: string,
    records: readonly unknown[],
    options?: BatchMigrationOptions
  ): Promise<MigrationReport> {
    return this.orchestrator.migrateBatch(platform, records, options);
  }

  /**
   * Read an uploaded CSV, JSON or Excel file and migrate its campaigns.
   * The platform is checked before the file is read.
   *
   * @throws MigrationError ADAPTER_NOT_FOUND | SCHEMA_NOT_FOUND | SCHEMA_LOAD_ERROR
   * @throws ConnectorError when the file cannot be read
   */
  async migrateFile(
    platform: string,
    filePath: string,
    options: LoadCampaignFileOptions & BatchMigrationOptions = {}
  ): Promise<MigrationReport> {
    const adapter = this.adapters.getOrThrow(platform);
    this.schemas.get(adapter.platform);

    const { concurrency, ...fileOptions } = options;
    const records = await loadCampaignFile(filePath, fileOptions);
    this.logger.info(`Loaded ${records.length} campaigns from ${filePath}`, {
      platform: adapter.platform,
    });

    return this.orchestrator.migrateBatch(platform, records, { concurrency });
  }

  /**
   * Validate a batch and describe how it differs from the expected schema
   */
  comparisonSummary(records: CampaignRecord[], platform: string): ComparisonSummary {
    const { issues } = this.batchValidator.validateBatch(records, platform);
    return this.batchValidator.buildComparisonSummary(records, issues, platform);
  }

  /**
   * Example of a well-formed source record for a platform
   */
  sampleFormat(platform: string): CampaignRecord {
    return buildSampleRecord(this.schemas.get(platform).validation);
  }

  /** Platforms that have both a source adapter and a schema */
  supportedPlatforms(): string[] {
    return this.adapters.listPlatforms().filter((platform) => this.schemas.has(platform)).sort();
  }
}
