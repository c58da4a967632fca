/**
 * @adshift/connector-api
 *
 * Platform clients: Facebook and Twitter as campaign sources, Taboola as the sink
 */

export { InMemoryAdsClient } from './shared/ads-client.js';
export type { AdsClientConfig } from './shared/ads-client.js';
export { BaseCampaignSource } from './shared/campaign-source.js';

export * from './facebook/index.js';
export * from './twitter/index.js';
export * from './taboola/index.js';
