/**
 * Twitter campaign source
 */

import type { ConnectorConfig } from '@adshift/core';
import { TwitterAdsClient } from './client.js';
import type { AdsClientConfig } from '../shared/ads-client.js';
import { BaseCampaignSource } from '../shared/campaign-source.js';

export interface TwitterSourceConfig extends ConnectorConfig {
  type: 'twitter';
}

export class TwitterCampaignSource extends BaseCampaignSource<TwitterSourceConfig> {
  readonly platform = 'twitter';

  constructor(
    config: Omit<TwitterSourceConfig, 'type'> & { type?: 'twitter' },
    client: TwitterAdsClient = new TwitterAdsClient()
  ) {
    super({ ...config, type: 'twitter' }, client);
  }
}

export function createTwitterSource(
  config: Omit<TwitterSourceConfig, 'type'>,
  clientConfig: AdsClientConfig = {}
): TwitterCampaignSource {
  return new TwitterCampaignSource(config, new TwitterAdsClient(clientConfig));
}
