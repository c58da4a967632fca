/**
 * Taboola Backstage client (in-process)
 *
 * Accepts campaign creation requests, rejects those missing a required field
 * (absent, empty, zero or false all count as missing) and keeps what it created.
 */

import type { CampaignRecord, CreatedCampaign } from '@adshift/core';
import { ConnectorError, Logger, cloneRecord } from '@adshift/core';

export const DEFAULT_TABOOLA_REQUIRED_FIELDS: readonly string[] = [
  'name',
  'branding_text',
  'cpc_bid',
  'daily_cap',
];

export interface TaboolaClientConfig {
  /** Fields a campaign must carry (default: name, branding_text, cpc_bid, daily_cap) */
  requiredFields?: readonly string[];
  /** First numeric campaign id handed out (default: 1) */
  firstId?: number;
  logger?: Logger;
}

export class TaboolaClient {
  private readonly requiredFields: readonly string[];
  private readonly created = new Map<string, CreatedCampaign>();
  private nextId: number;
  private readonly logger: Logger;

  constructor(config: TaboolaClientConfig = {}) {
    this.requiredFields = config.requiredFields ?? DEFAULT_TABOOLA_REQUIRED_FIELDS;
    this.nextId = config.firstId ?? 1;
    this.logger = (config.logger ?? new Logger({ level: 'warn' })).child({ client: 'Taboola' });
  }

  /**
   * Create a campaign
   * @throws ConnectorError VALIDATION_ERROR with `context.missingFields`
   */
  async createCampaign(campaign: CampaignRecord, connectorId?: string): Promise<CreatedCampaign> {
    const label = typeof campaign.name === 'string' ? campaign.name : '';
    this.logger.info(`Taboola API: Validating data for new campaign '${label}'...`);

    const missingFields = this.requiredFields.filter((field) => !campaign[field]);
    if (missingFields.length > 0) {
      throw new ConnectorError({
        code: 'VALIDATION_ERROR',
        message: `Cannot create campaign. Missing required fields: ${missingFields.join(', ')}`,
        connectorId,
        suggestion: 'Provide the missing fields through overrides or the source data.',
        context: { missingFields },
      });
    }

    const id = `taboola_campaign_${this.nextId++}`;
    const result: CreatedCampaign = {
      ...cloneRecord(campaign),
      id,
      name: label,
      status: 'PENDING_APPROVAL',
    };
    this.created.set(id, result);

    this.logger.info('Taboola API: Campaign created', { id });
    return structuredClone(result);
  }

  async getCampaign(id: string): Promise<CreatedCampaign | undefined> {
    const campaign = this.created.get(id);
    return campaign ? structuredClone(campaign) : undefined;
  }

  listCreated(): CreatedCampaign[] {
    return Array.from(this.created.values(), (campaign) => structuredClone(campaign));
  }
}
