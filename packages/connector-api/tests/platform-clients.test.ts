import { describe, expect, it } from 'vitest';
import {
  FacebookCampaignSource,
  TaboolaCampaignSink,
  TaboolaClient,
  createFacebookSource,
  createTaboolaSink,
  createTwitterSource,
} from '../src/index.js';

describe('Facebook campaign source', () => {
  it('serves the default campaign', async () => {
    const source = new FacebookCampaignSource({ id: 'fb', name: 'Facebook' });

    await expect(source.listCampaignIds()).resolves.toEqual(['fb_campaign_1']);
    await expect(source.getCampaign('fb_campaign_1')).resolves.toMatchObject({
      name: 'My Awesome FB Campaign',
      objective: 'LINK_CLICKS',
      daily_budget: 2000,
    });
  });

  it('hands out copies', async () => {
    const source = createFacebookSource({ id: 'fb', name: 'Facebook' });

    const first = await source.getCampaign('fb_campaign_1');
    first.name = 'Changed';
    const second = await source.getCampaign('fb_campaign_1');

    expect(second.name).toBe('My Awesome FB Campaign');
  });

  it('throws NOT_FOUND for unknown campaigns', async () => {
    const source = createFacebookSource({ id: 'fb', name: 'Facebook' });

    await expect(source.getCampaign('nope')).rejects.toMatchObject({
      code: 'NOT_FOUND',
      connectorId: 'fb',
      message: "Facebook campaign 'nope' not found",
    });
  });

  it('rejects an empty campaign id', async () => {
    const source = createFacebookSource({ id: 'fb', name: 'Facebook' });
    await expect(source.getCampaign('  ')).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });
});

describe('Twitter campaign source', () => {
  it('serves configured campaigns instead of the defaults', async () => {
    const source = createTwitterSource(
      { id: 'tw', name: 'Twitter' },
      { campaigns: { launch: { name: 'Launch', total_budget: 300 } } }
    );

    expect(source.platform).toBe('twitter');
    await expect(source.listCampaignIds()).resolves.toEqual(['launch']);
    await expect(source.getCampaign('launch')).resolves.toEqual({
      name: 'Launch',
      total_budget: 300,
    });
  });
});

describe('Taboola campaign sink', () => {
  const complete = { name: 'Promo', branding_text: 'Acme', cpc_bid: 0.5, daily_cap: 20 };

  it('creates campaigns pending approval with sequential ids', async () => {
    const sink = createTaboolaSink({ id: 'taboola', name: 'Taboola' });

    const first = await sink.createCampaign(complete);
    const second = await sink.createCampaign({ ...complete, name: 'Second' });

    expect(first).toEqual({ ...complete, id: 'taboola_campaign_1', status: 'PENDING_APPROVAL' });
    expect(second.id).toBe('taboola_campaign_2');
  });

  it('treats falsy values as missing', async () => {
    const sink = createTaboolaSink({ id: 'taboola', name: 'Taboola' });

    await expect(
      sink.createCampaign({ name: 'Promo', cpc_bid: 0, daily_cap: 20 })
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      connectorId: 'taboola',
      message: 'Cannot create campaign. Missing required fields: branding_text, cpc_bid',
      context: { missingFields: ['branding_text', 'cpc_bid'] },
    });
  });

  it('honours configured required fields', async () => {
    const client = new TaboolaClient({ requiredFields: ['name'], firstId: 100 });
    const sink = new TaboolaCampaignSink({ id: 'taboola', name: 'Taboola' }, client);

    const created = await sink.createCampaign({ name: 'Bare' });

    expect(created.id).toBe('taboola_campaign_100');
    expect(client.listCreated().map((c) => c.name)).toEqual(['Bare']);
    await expect(client.getCampaign('taboola_campaign_100')).resolves.toMatchObject({
      status: 'PENDING_APPROVAL',
    });
  });
});
