/**
 * In-process ads platform client
 *
 * Serves campaigns from a seeded store the way a platform's read API would:
 * records are copied on the way in and on the way out, so callers never share
 * state with the store.
 */

import type { CampaignRecord } from '@adshift/core';
import { Logger, cloneRecord } from '@adshift/core';

export interface AdsClientConfig {
  /** Campaigns keyed by platform campaign id */
  campaigns?: Record<string, CampaignRecord>;
  logger?: Logger;
}

export class InMemoryAdsClient {
  private readonly campaigns = new Map<string, CampaignRecord>();
  protected readonly logger: Logger;

  constructor(
    readonly platformLabel: string,
    config: AdsClientConfig,
    defaults: Record<string, CampaignRecord>
  ) {
    this.logger = (config.logger ?? new Logger({ level: 'warn' })).child({
      client: platformLabel,
    });

    for (const [id, campaign] of Object.entries(config.campaigns ?? defaults)) {
      this.campaigns.set(id, cloneRecord(campaign));
    }
  }

  /**
   * Get a single campaign by ID
   * @returns undefined when the platform has no such campaign
   */
  async getCampaign(campaignId: string): Promise<CampaignRecord | undefined> {
    this.logger.info(`${this.platformLabel} API: Fetching campaign ${campaignId}...`);
    const campaign = this.campaigns.get(campaignId);
    return campaign ? cloneRecord(campaign) : undefined;
  }

  async listCampaignIds(): Promise<string[]> {
    return Array.from(this.campaigns.keys());
  }

  /**
   * Add or replace a campaign (test setup, demos)
   */
  seed(campaignId: string, campaign: CampaignRecord): void {
    this.campaigns.set(campaignId, cloneRecord(campaign));
  }
}
