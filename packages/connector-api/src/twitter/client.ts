/**
 * Twitter Ads client (in-process)
 * Twitter campaigns carry a total budget rather than a daily one.
 */

import type { CampaignRecord } from '@adshift/core';
import { InMemoryAdsClient, type AdsClientConfig } from '../shared/ads-client.js';

export const DEFAULT_TWITTER_CAMPAIGNS: Record<string, CampaignRecord> = {
  tw_campaign_1: {
    name: 'My Awesome Twitter Campaign',
    total_budget: 5000,
    account_name: 'My Twitter Brand',
    tweet_creatives: [{ media_url: 'https://twitter.example/img.png', text: 'My Twitter Ad' }],
  },
};

export class TwitterAdsClient extends InMemoryAdsClient {
  constructor(config: AdsClientConfig = {}) {
    super('Twitter', config, DEFAULT_TWITTER_CAMPAIGNS);
  }
}
