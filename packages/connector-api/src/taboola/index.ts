export { TaboolaClient, DEFAULT_TABOOLA_REQUIRED_FIELDS } from './client.js';
export type { TaboolaClientConfig } from './client.js';
export { TaboolaCampaignSink, createTaboolaSink } from './connector.js';
export type { TaboolaSinkConfig } from './connector.js';
