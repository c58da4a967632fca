/**
 * Shared ICampaignSource implementation for the in-process platform clients
 */

import type { CampaignRecord, ConnectorConfig, ICampaignSource } from '@adshift/core';
import { ConnectorError, wrapError } from '@adshift/core';
import type { InMemoryAdsClient } from './ads-client.js';

export abstract class BaseCampaignSource<TConfig extends ConnectorConfig>
  implements ICampaignSource<TConfig>
{
  readonly config: TConfig;
  abstract readonly platform: string;

  protected constructor(
    config: TConfig,
    protected readonly client: InMemoryAdsClient
  ) {
    this.config = config;
  }

  async getCampaign(campaignId: string): Promise<CampaignRecord> {
    if (campaignId.trim() === '') {
      throw new ConnectorError({
        code: 'VALIDATION_ERROR',
        message: 'Campaign ID must not be empty',
        connectorId: this.config.id,
      });
    }

    let campaign: CampaignRecord | undefined;
    try {
      campaign = await this.client.getCampaign(campaignId);
    } catch (error) {
      throw wrapError(error, this.config.id, 'READ_FAILED');
    }

    if (!campaign) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `${this.client.platformLabel} campaign '${campaignId}' not found`,
        connectorId: this.config.id,
        suggestion: 'Check the campaign ID in the source ads account.',
        context: { campaignId },
      });
    }

    return campaign;
  }

  async listCampaignIds(): Promise<string[]> {
    try {
      return await this.client.listCampaignIds();
    } catch (error) {
      throw wrapError(error, this.config.id, 'READ_FAILED');
    }
  }
}
