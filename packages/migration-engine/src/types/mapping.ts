import type { CampaignRecord } from '@adshift/core';

/** Output of mapping one source record onto the canonical target shape */
export interface MappingResult {
  record: CampaignRecord;
  /** Cast failures and static rule warnings, in rule order */
  warnings: string[];
  /** Target fields that got neither a value nor a default */
  missingFields: string[];
}
