/**
 * Record types for campaign data flowing through the migration pipeline
 */

/**
 * Generic campaign record - field name to value.
 *
 * Values stay unknown because records arrive untyped from uploads and
 * platform APIs; the structural validator is what narrows them.
 */
export type CampaignRecord = {
  [key: string]: unknown;
};
