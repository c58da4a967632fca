/**
 * MigrationOrchestrator
 *
 * Drives records through FETCHING -> VALIDATING -> MAPPING -> OVERRIDING ->
 * UPLOADING -> DONE, with FAILED reachable from every stage. A record's
 * failure is written to the report and never stops the rest of a batch; only
 * platform resolution and schema loading abort a whole operation.
 */

import type { CampaignRecord, ICampaignSink, PlatformSchema } from '@adshift/core';
import { ConnectorError, Logger, describeValueType } from '@adshift/core';
import { MigrationError, toMigrationError } from '../errors/index.js';
import { FieldMapper, applyOverrides } from '../mapping/index.js';
import type { SchemaRegistry } from '../schema/index.js';
import type { FieldOverrides, MigrationStage, ValidationIssue } from '../types/index.js';
import { StructuralValidator } from '../validation/index.js';
import { MigrationReport } from './migration-report.js';
import type { AdapterRegistry, SourceAdapter } from './source-adapter.js';
import { runBounded } from './worker-pool.js';

export interface MigrationOrchestratorOptions {
  schemas: SchemaRegistry;
  adapters: AdapterRegistry;
  sink: ICampaignSink;
  logger?: Logger;
  /** Validate source records before mapping (default: true) */
  validateBeforeMapping?: boolean;
  /** Report mapped fields that got neither a value nor a default (default: true) */
  warnOnMissingFields?: boolean;
  /** Records migrated at once in batch mode (default: 1) */
  concurrency?: number;
}

export interface BatchMigrationOptions {
  concurrency?: number;
}

/** One record's trip through the pipeline */
interface RecordJob {
  index: number;
  fallbackName: string;
  schema: PlatformSchema;
  load: () => Promise<CampaignRecord>;
  /** Issues already found by a batch validation pass */
  issues?: ValidationIssue[];
  overrides?: FieldOverrides;
  /** Prefix warnings with the campaign name (batch mode) */
  labelWarnings: boolean;
}

function displayName(record: CampaignRecord, fallback: string): string {
  const name = record.name;
  return typeof name === 'string' && name.trim() !== '' ? name : fallback;
}

function notACampaign(entry: unknown, index: number): MigrationError {
  return new MigrationError({
    code: 'VALIDATION_FAILED',
    message: `Entry ${index + 1} is not a campaign object (got ${describeValueType(entry)})`,
    suggestion: 'Each campaign must be a JSON object or a spreadsheet row.',
    context: { recordIndex: index },
  });
}

function describeIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => `${issue.fieldPath} (${issue.issueType})`).join(', ');
}

export class MigrationOrchestrator {
  private readonly schemas: SchemaRegistry;
  private readonly adapters: AdapterRegistry;
  private readonly sink: ICampaignSink;
  private readonly logger: Logger;
  private readonly validator = new StructuralValidator();
  private readonly mapper = new FieldMapper();
  private readonly validateBeforeMapping: boolean;
  private readonly warnOnMissingFields: boolean;
  private readonly concurrency: number;

  constructor(options: MigrationOrchestratorOptions) {
    this.schemas = options.schemas;
    this.adapters = options.adapters;
    this.sink = options.sink;
    this.logger = (options.logger ?? new Logger({ level: 'warn' })).child({
      component: 'orchestrator',
    });
    this.validateBeforeMapping = options.validateBeforeMapping ?? true;
    this.warnOnMissingFields = options.warnOnMissingFields ?? true;
    this.concurrency = options.concurrency ?? 1;
  }

  /**
   * Migrate a single campaign fetched from the source platform
   *
   * @param overrides - manual corrections applied after mapping
   * @throws MigrationError ADAPTER_NOT_FOUND | SCHEMA_NOT_FOUND | SCHEMA_LOAD_ERROR
   */
  async migrateOne(
    platform: string,
    campaignId: string,
    overrides?: FieldOverrides
  ): Promise<MigrationReport> {
    const { adapter, schema } = this.resolve(platform);
    const report = new MigrationReport(this.logger.child({ platform: schema.platform, campaignId }));

    this.logger.info(`Starting migration of campaign '${campaignId}' from ${schema.platform}`);

    await this.processRecord(
      {
        index: 0,
        fallbackName: campaignId,
        schema,
        load: () => adapter.fetchCampaign(campaignId),
        overrides,
        labelWarnings: false,
      },
      report
    );

    this.logger.info(`Migration finished\n${report.toString()}`);
    return report;
  }

  /**
   * Migrate a batch of records (typically read from an uploaded file).
   * Always returns a report once the platform resolved, even if every record
   * failed; entries that are not campaign objects fail on their own.
   *
   * @throws MigrationError ADAPTER_NOT_FOUND | SCHEMA_NOT_FOUND | SCHEMA_LOAD_ERROR
   */
  async migrateBatch(
    platform: string,
    records: readonly unknown[],
    options: BatchMigrationOptions = {}
  ): Promise<MigrationReport> {
    const { adapter, schema } = this.resolve(platform);
    const report = new MigrationReport(this.logger.child({ platform: schema.platform, mode: 'batch' }));
    const incoming = adapter.fromFile(records);

    this.logger.info(
      `Starting batch migration from ${schema.platform} (${incoming.length} campaigns)`
    );

    const issuesByIndex = new Map<number, ValidationIssue[]>();
    if (this.validateBeforeMapping) {
      incoming.forEach((record, index) => {
        if (record) {
          issuesByIndex.set(
            index,
            this.validator.validate(record, schema.validation, index, schema.platform)
          );
        }
      });
      const valid = Array.from(issuesByIndex.values()).filter((list) => list.length === 0).length;
      this.logger.info(`Validation complete: ${valid}/${incoming.length} campaigns valid`);
    }

    const jobs: RecordJob[] = incoming.map((record, index) => ({
      index,
      fallbackName: `Campaign_${index + 1}`,
      schema,
      load: async () => {
        if (!record) {
          throw notACampaign(records[index], index);
        }
        return record;
      },
      issues: issuesByIndex.get(index),
      labelWarnings: true,
    }));

    await runBounded(jobs.length, options.concurrency ?? this.concurrency, async (i) => {
      const job = jobs[i];
      if (job) {
        await this.processRecord(job, report);
      }
    });

    this.logger.info(`Batch migration finished\n${report.toString()}`);
    return report;
  }

  private resolve(platform: string): { adapter: SourceAdapter; schema: PlatformSchema } {
    const adapter = this.adapters.getOrThrow(platform);
    const schema = this.schemas.get(adapter.platform);
    return { adapter, schema };
  }

  /**
   * Run one record to a terminal outcome. Never throws.
   */
  private async processRecord(job: RecordJob, report: MigrationReport): Promise<void> {
    const { index, schema } = job;
    let name = job.fallbackName;
    let issues: ValidationIssue[] = [];
    const recordWarnings: string[] = [];

    try {
      report.transition(index, 'FETCHING');
      const source = await job.load();
      name = displayName(source, job.fallbackName);

      if (this.validateBeforeMapping) {
        report.transition(index, 'VALIDATING');
        issues =
          job.issues ?? this.validator.validate(source, schema.validation, index, schema.platform);

        if (issues.length > 0) {
          throw new MigrationError({
            code: 'VALIDATION_FAILED',
            message: `${issues.length} validation issue(s): ${describeIssues(issues)}`,
            suggestion: 'Correct the listed fields in the source data and retry.',
            context: { issues },
          });
        }
      }

      report.transition(index, 'MAPPING');
      const mapped = this.mapper.map(source, schema);
      recordWarnings.push(...mapped.warnings);
      if (this.warnOnMissingFields) {
        for (const field of mapped.missingFields) {
          recordWarnings.push(`No value or default found for field '${field}'`);
        }
      }
      for (const warning of recordWarnings) {
        report.addWarning(job.labelWarnings ? `Campaign '${name}': ${warning}` : warning);
      }

      let record = mapped.record;
      if (job.overrides) {
        report.transition(index, 'OVERRIDING');
        record = applyOverrides(record, job.overrides);
      }

      report.transition(index, 'UPLOADING');
      const created = await this.sink.createCampaign(record);

      report.transition(index, 'DONE');
      report.addSuccess(
        `Campaign '${name}' created in ${this.sink.platform} with ID '${created.id}'`
      );
      report.addOutcome({
        recordIndex: index,
        campaignName: name,
        status: recordWarnings.length > 0 ? 'warning' : 'success',
        stage: 'DONE',
        targetId: created.id,
      });
    } catch (error) {
      this.fail(report, index, name, issues, error);
    }
  }

  private fail(
    report: MigrationReport,
    index: number,
    name: string,
    issues: ValidationIssue[],
    error: unknown
  ): void {
    const failedStage = report.stageOf(index);
    const migrationError = this.classify(error, failedStage, index, name);

    if (migrationError.code === 'UNEXPECTED_ERROR') {
      this.logger.error('Unexpected error while migrating campaign', {
        error: migrationError.toJSON(),
        stack: error instanceof Error ? error.stack : undefined,
      });
    }

    report.transition(index, 'FAILED');
    report.addFailure(
      `Failed to migrate campaign '${name}': ${migrationError.message}`,
      migrationError.kind
    );

    report.addOutcome({
      recordIndex: index,
      campaignName: name,
      status: 'failure',
      stage: 'FAILED',
      failedStage,
      errorKind: migrationError.kind,
      ...(migrationError.suggestion ? { suggestion: migrationError.suggestion } : {}),
      ...(migrationError.code === 'VALIDATION_FAILED' ? { issues } : {}),
    });
  }

  /**
   * Decide which error kind a failure is filed under, by where it happened
   */
  private classify(
    error: unknown,
    stage: MigrationStage | undefined,
    recordIndex: number,
    campaign: string
  ): MigrationError {
    if (error instanceof MigrationError) {
      return error;
    }

    const context = { stage, recordIndex, campaign };

    if (error instanceof ConnectorError && stage === 'FETCHING') {
      return toMigrationError(error, 'FETCH_FAILED', { ...context, connectorCode: error.code });
    }
    if (error instanceof ConnectorError && stage === 'UPLOADING') {
      return toMigrationError(error, 'UPLOAD_REJECTED', {
        ...context,
        connectorCode: error.code,
        ...error.context,
      });
    }

    return toMigrationError(error, 'UNEXPECTED_ERROR', context);
  }
}
