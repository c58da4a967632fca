export { FacebookAdsClient, DEFAULT_FACEBOOK_CAMPAIGNS } from './client.js';
export { FacebookCampaignSource, createFacebookSource } from './connector.js';
export type { FacebookSourceConfig } from './connector.js';
