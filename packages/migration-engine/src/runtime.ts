/**
 * Wires an engine from configuration: logger, schema registry, one source
 * adapter per configured platform and the Taboola sink.
 */

import type { ICampaignSource } from '@adshift/core';
import { Logger } from '@adshift/core';
import {
  createFacebookSource,
  createTaboolaSink,
  createTwitterSource,
} from '@adshift/connector-api';
import type { EngineConfig, SourceEntry } from './config.js';
import { MigrationEngine } from './engine.js';
import { AdapterRegistry, ClientSourceAdapter } from './migration/index.js';
import { SchemaRegistry } from './schema/index.js';

const DEFAULT_SOURCES: SourceEntry[] = [{ type: 'facebook' }, { type: 'twitter' }];

function createSource(entry: SourceEntry, logger: Logger): ICampaignSource {
  const config = { id: entry.id ?? entry.type, name: entry.name ?? entry.type };
  const clientConfig = { campaigns: entry.campaigns, logger };

  switch (entry.type) {
    case 'facebook':
      return createFacebookSource(config, clientConfig);
    case 'twitter':
      return createTwitterSource(config, clientConfig);
  }
}

export interface CreateEngineOptions {
  /** Replaces the logger built from `config.logging` */
  logger?: Logger;
  /** Load every schema up front so a broken definition fails here */
  preloadSchemas?: boolean;
}

export function createMigrationEngine(
  config: EngineConfig = {},
  options: CreateEngineOptions = {}
): MigrationEngine {
  const logger =
    options.logger ??
    new Logger({ level: config.logging?.level ?? 'info', format: config.logging?.format ?? 'text' });

  const schemas = new SchemaRegistry({ schemaDir: config.schemaDir, logger });
  if (options.preloadSchemas) {
    schemas.preload();
  }

  const adapters = new AdapterRegistry();
  for (const entry of config.sources ?? DEFAULT_SOURCES) {
    adapters.register(new ClientSourceAdapter(createSource(entry, logger), logger));
  }

  const target = config.target;
  const sink = createTaboolaSink(
    { id: target?.id ?? 'taboola', name: target?.name ?? 'Taboola' },
    { requiredFields: target?.requiredFields, logger }
  );

  logger.debug('Migration engine ready', {
    sources: adapters.listPlatforms(),
    target: sink.platform,
  });

  return new MigrationEngine({
    schemas,
    adapters,
    sink,
    logger,
    validateBeforeMapping: config.migration?.validateBeforeMapping,
    warnOnMissingFields: config.migration?.warnOnMissingFields,
    concurrency: config.migration?.concurrency,
  });
}
