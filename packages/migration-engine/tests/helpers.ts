import type { CampaignRecord, CreatedCampaign, ICampaignSink } from '@adshift/core';
import { ConnectorError, Logger } from '@adshift/core';

export const silentLogger = new Logger({ level: 'silent' });

/**
 * Sink that keeps uploads in memory and rejects chosen campaign names
 */
export class RecordingSink implements ICampaignSink {
  readonly config = { id: 'recording-sink', name: 'Recording sink', type: 'taboola' };
  readonly platform = 'taboola';
  readonly uploads: CampaignRecord[] = [];

  constructor(
    private readonly reject: ReadonlySet<string> = new Set(),
    private readonly crash: ReadonlySet<string> = new Set()
  ) {}

  async createCampaign(record: CampaignRecord): Promise<CreatedCampaign> {
    const name = typeof record.name === 'string' ? record.name : '';

    if (this.crash.has(name)) {
      throw new Error('boom');
    }
    if (this.reject.has(name)) {
      throw new ConnectorError({
        code: 'VALIDATION_ERROR',
        message: `Campaign '${name}' rejected`,
        connectorId: this.config.id,
        context: { missingFields: ['branding_text'] },
      });
    }

    this.uploads.push(record);
    return { id: `t_${this.uploads.length}`, name, status: 'PENDING_APPROVAL' };
  }
}

/**
 * Run `fn` and return what it threw
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
