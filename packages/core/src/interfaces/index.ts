export type {
  ConnectorConfig,
  ICampaignSource,
  ICampaignSink,
  CreatedCampaign,
} from './connector.js';
