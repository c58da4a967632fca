/**
 * Connector Interfaces
 *
 * Platform clients implement these so the migration engine can fetch source
 * campaigns and hand finished records to the target platform without knowing
 * which platform sits behind them.
 */

import type { CampaignRecord } from '../types/index.js';

/** Configuration common to all connectors */
export interface ConnectorConfig {
  /** Unique identifier for this connector instance */
  id: string;
  /** Human-readable name */
  name: string;
  /** Connector type (facebook, twitter, taboola, ...) */
  type: string;
}

/**
 * A platform campaigns are migrated from
 */
export interface ICampaignSource<TConfig extends ConnectorConfig = ConnectorConfig> {
  readonly config: TConfig;

  /** Platform identifier, matches the schema registry key */
  readonly platform: string;

  /**
   * Fetch a single campaign by its platform id
   * @throws ConnectorError (NOT_FOUND, VALIDATION_ERROR, READ_FAILED)
   */
  getCampaign(campaignId: string): Promise<CampaignRecord>;

  /**
   * List the campaign ids this source can serve
   */
  listCampaignIds(): Promise<string[]>;
}

/** Response of the target platform after a campaign was created */
export interface CreatedCampaign {
  id: string;
  name: string;
  status: string;
  [key: string]: unknown;
}

/**
 * A platform finished records are uploaded to
 */
export interface ICampaignSink<TConfig extends ConnectorConfig = ConnectorConfig> {
  readonly config: TConfig;

  /** Platform identifier of the target */
  readonly platform: string;

  /**
   * Create a campaign from a canonical record
   * @throws ConnectorError VALIDATION_ERROR naming the rejected fields
   */
  createCampaign(record: CampaignRecord): Promise<CreatedCampaign>;
}
