/**
 * Taboola campaign sink
 */

import type { CampaignRecord, ConnectorConfig, CreatedCampaign, ICampaignSink } from '@adshift/core';
import { wrapError } from '@adshift/core';
import { TaboolaClient, type TaboolaClientConfig } from './client.js';

export interface TaboolaSinkConfig extends ConnectorConfig {
  type: 'taboola';
}

export class TaboolaCampaignSink implements ICampaignSink<TaboolaSinkConfig> {
  readonly config: TaboolaSinkConfig;
  readonly platform = 'taboola';

  constructor(
    config: Omit<TaboolaSinkConfig, 'type'> & { type?: 'taboola' },
    readonly client: TaboolaClient = new TaboolaClient()
  ) {
    this.config = { ...config, type: 'taboola' };
  }

  async createCampaign(record: CampaignRecord): Promise<CreatedCampaign> {
    try {
      return await this.client.createCampaign(record, this.config.id);
    } catch (error) {
      throw wrapError(error, this.config.id, 'WRITE_FAILED');
    }
  }
}

export function createTaboolaSink(
  config: Omit<TaboolaSinkConfig, 'type'>,
  clientConfig: TaboolaClientConfig = {}
): TaboolaCampaignSink {
  return new TaboolaCampaignSink(config, new TaboolaClient(clientConfig));
}
