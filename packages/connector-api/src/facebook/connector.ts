/**
 * Facebook campaign source
 */

import type { ConnectorConfig } from '@adshift/core';
import { FacebookAdsClient } from './client.js';
import type { AdsClientConfig } from '../shared/ads-client.js';
import { BaseCampaignSource } from '../shared/campaign-source.js';

export interface FacebookSourceConfig extends ConnectorConfig {
  type: 'facebook';
}

export class FacebookCampaignSource extends BaseCampaignSource<FacebookSourceConfig> {
  readonly platform = 'facebook';

  constructor(
    config: Omit<FacebookSourceConfig, 'type'> & { type?: 'facebook' },
    client: FacebookAdsClient = new FacebookAdsClient()
  ) {
    super({ ...config, type: 'facebook' }, client);
  }
}

/**
 * Factory function to create a Facebook source with its own client
 */
export function createFacebookSource(
  config: Omit<FacebookSourceConfig, 'type'>,
  clientConfig: AdsClientConfig = {}
): FacebookCampaignSource {
  return new FacebookCampaignSource(config, new FacebookAdsClient(clientConfig));
}
