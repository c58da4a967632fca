/**
 * Facebook Ads client (in-process)
 * Budgets are kept in cents, as the Marketing API returns them.
 */

import type { CampaignRecord } from '@adshift/core';
import { InMemoryAdsClient, type AdsClientConfig } from '../shared/ads-client.js';

export const DEFAULT_FACEBOOK_CAMPAIGNS: Record<string, CampaignRecord> = {
  fb_campaign_1: {
    name: 'My Awesome FB Campaign',
    objective: 'LINK_CLICKS',
    daily_budget: 2000,
    targeting: { geo: 'US', age_min: 25, interests: ['sports', 'finance'] },
    creatives: [{ image_url: 'https://facebook.example/img.png', headline: 'My FB Ad' }],
  },
};

export class FacebookAdsClient extends InMemoryAdsClient {
  constructor(config: AdsClientConfig = {}) {
    super('Facebook', config, DEFAULT_FACEBOOK_CAMPAIGNS);
  }
}
