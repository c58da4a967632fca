/**
 * Source Adapters
 *
 * An adapter is the engine's handle on one source platform: it fetches a
 * campaign through the platform's client, or accepts records that arrived
 * in an uploaded file. The registry resolves a platform identifier to its
 * adapter, and an unsupported platform stops the whole operation.
 */

import type { CampaignRecord, ICampaignSource } from '@adshift/core';
import { Logger, cloneRecord, isPlainObject } from '@adshift/core';
import { MigrationError } from '../errors/index.js';

export interface SourceAdapter {
  readonly platform: string;

  /**
   * Fetch one campaign from the platform
   * @throws whatever the platform client throws (usually ConnectorError)
   */
  fetchCampaign(campaignId: string): Promise<CampaignRecord>;

  /**
   * Take over entries read from an uploaded file. Entries that are not
   * campaign objects come back as undefined, in place.
   */
  fromFile(records: readonly unknown[]): Array<CampaignRecord | undefined>;
}

export class ClientSourceAdapter implements SourceAdapter {
  readonly platform: string;
  private readonly logger: Logger;

  constructor(
    private readonly source: ICampaignSource,
    logger?: Logger
  ) {
    this.platform = source.platform.toLowerCase();
    this.logger = (logger ?? new Logger({ level: 'warn' })).child({
      component: 'source-adapter',
      platform: this.platform,
    });
  }

  async fetchCampaign(campaignId: string): Promise<CampaignRecord> {
    this.logger.debug('Fetching campaign', { campaignId, connector: this.source.config.id });
    return cloneRecord(await this.source.getCampaign(campaignId));
  }

  fromFile(records: readonly unknown[]): Array<CampaignRecord | undefined> {
    this.logger.info(`Processing ${records.length} ${this.platform} campaigns from file`);
    return records.map((record) => (isPlainObject(record) ? cloneRecord(record) : undefined));
  }
}

export class AdapterRegistry {
  private adapters = new Map<string, SourceAdapter>();

  register(adapter: SourceAdapter): void {
    const platform = adapter.platform.toLowerCase();

    if (this.adapters.has(platform)) {
      throw new MigrationError({
        code: 'CONFIGURATION_ERROR',
        message: `An adapter for platform '${platform}' is already registered`,
        suggestion: 'Register one source adapter per platform.',
      });
    }

    this.adapters.set(platform, adapter);
  }

  get(platform: string): SourceAdapter | undefined {
    return this.adapters.get(platform.toLowerCase());
  }

  /**
   * Get the adapter for a platform
   * @throws MigrationError ADAPTER_NOT_FOUND
   */
  getOrThrow(platform: string): SourceAdapter {
    const adapter = this.get(platform);

    if (!adapter) {
      throw new MigrationError({
        code: 'ADAPTER_NOT_FOUND',
        message: `Migration from '${platform}' is not supported`,
        suggestion: `Supported platforms: ${this.listPlatforms().join(', ') || 'none'}`,
        context: { platform },
      });
    }

    return adapter;
  }

  listPlatforms(): string[] {
    return Array.from(this.adapters.keys());
  }

  get size(): number {
    return this.adapters.size;
  }
}
