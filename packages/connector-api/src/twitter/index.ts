export { TwitterAdsClient, DEFAULT_TWITTER_CAMPAIGNS } from './client.js';
export { TwitterCampaignSource, createTwitterSource } from './connector.js';
export type { TwitterSourceConfig } from './connector.js';
