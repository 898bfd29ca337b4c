import { describe, expect, it } from 'vitest';

import { UpstreamUnavailableError } from '../../errors';
import { rawPhoto } from '../../test-support/fake-flickr';
import { createTestContext } from '../../test-support/harness';

import { PerContactLatestPhotoStrategy, createLatestPhotoStrategy } from './latest-photo-strategy';

describe('createLatestPhotoStrategy', () => {
  it('follows the configured strategy name', () => {
    const { flickr, cache, policies, metrics } = createTestContext();
    const client = flickr.createClient();

    expect(createLatestPhotoStrategy('per-contact', client, cache, policies, metrics)).toBeInstanceOf(
      PerContactLatestPhotoStrategy,
    );
    expect(createLatestPhotoStrategy('snapshot', client, cache, policies, metrics).name).toBe('snapshot');
  });
});

describe('PerContactLatestPhotoStrategy', () => {
  it('answers contacts without photos with a not-found entry', async () => {
    const ctx = createTestContext('per-contact');
    ctx.flickr.on('flickr.people.getPhotos', (params) =>
      params.get('user_id') === 'a@N01'
        ? { body: { stat: 'ok', photos: { photo: [rawPhoto('10', 'a@N01')] } } }
        : { body: { stat: 'ok', photos: { photo: [] } } },
    );
    const session = await ctx.createSession();

    const result = await ctx.photoService.getFriendLatestPhotos(session, ['a@N01', 'b@N01']);

    expect(result.get('a@N01')).toMatchObject({ status: 'found', value: { id: '10', owner: 'a@N01' } });
    expect(result.get('b@N01')).toEqual({ status: 'not_found', message: 'No photo found' });
    expect(await ctx.store.get('friend_latest_photo:b@N01')).toBe('{"found":false,"error":"No photo found"}');
  });

  it('reports aborted fetches as unavailable and caches nothing for them', async () => {
    const ctx = createTestContext('per-contact');
    ctx.flickr.reply('flickr.people.getPhotos', { photos: { photo: [rawPhoto('10', 'a@N01')] } });
    const session = await ctx.createSession();
    const controller = new AbortController();
    controller.abort();

    const result = await ctx.photoService.getFriendLatestPhotos(session, ['a@N01', 'b@N01'], controller.signal);

    expect(result.get('a@N01')?.status).toBe('unavailable');
    expect(result.get('b@N01')?.status).toBe('unavailable');
    expect(ctx.store.keys().filter((key) => key.startsWith('friend_latest_photo:'))).toEqual([]);
  });
});

describe('SnapshotLatestPhotoStrategy', () => {
  const SNAPSHOT = {
    photos: {
      photo: [rawPhoto('21', 'a@N01'), rawPhoto('22', 'c@N01'), rawPhoto('20', 'a@N01')],
    },
  };

  it('answers a whole batch from a single contacts-photos call', async () => {
    const ctx = createTestContext('snapshot');
    ctx.flickr.reply('flickr.photos.getContactsPhotos', SNAPSHOT);
    const session = await ctx.createSession();

    const first = await ctx.photoService.getFriendLatestPhotos(session, ['a@N01', 'b@N01', 'c@N01']);
    const second = await ctx.photoService.getFriendLatestPhotos(session, ['c@N01']);

    expect(first.get('a@N01')).toMatchObject({ status: 'found', value: { id: '21' } });
    expect(first.get('b@N01')).toEqual({ status: 'not_found', message: 'No photo found' });
    expect(first.get('c@N01')).toMatchObject({ status: 'found', value: { id: '22' } });
    expect(second.get('c@N01')).toMatchObject({ status: 'found', value: { id: '22' } });

    const calls = ctx.flickr.callsTo('flickr.photos.getContactsPhotos');
    expect(calls).toHaveLength(1);
    expect(calls[0]?.params.get('count')).toBe('50');
    expect(calls[0]?.params.get('single_photo')).toBe('1');
    expect(ctx.flickr.callsTo('flickr.people.getPhotos')).toEqual([]);
  });

  it('keys the snapshot by viewer', async () => {
    const ctx = createTestContext('snapshot');
    ctx.flickr.reply('flickr.photos.getContactsPhotos', SNAPSHOT);
    const alice = await ctx.createSession();
    const bob = await ctx.createSession({
      accessToken: 'other-token',
      accessTokenSecret: 'other-token-secret',
      nsid: 'other@N01',
      username: 'other',
    });

    await ctx.photoService.getFriendLatestPhotos(alice, ['a@N01']);
    await ctx.photoService.getFriendLatestPhotos(bob, ['a@N01']);

    expect(ctx.flickr.callsTo('flickr.photos.getContactsPhotos')).toHaveLength(2);
    expect(await ctx.store.get('contacts_photos:viewer@N01')).toBeDefined();
    expect(await ctx.store.get('contacts_photos:other@N01')).toBeDefined();
  });

  it('marks every contact unavailable when the snapshot cannot be fetched', async () => {
    const ctx = createTestContext('snapshot');
    ctx.flickr.fail('flickr.photos.getContactsPhotos');
    const session = await ctx.createSession();

    const result = await ctx.photoService.getFriendLatestPhotos(session, ['a@N01', 'b@N01']);

    expect(Array.from(result.keys())).toEqual(['a@N01', 'b@N01']);
    for (const lookup of result.values()) {
      expect(lookup.status).toBe('unavailable');
      expect(lookup.status === 'unavailable' && lookup.error).toBeInstanceOf(UpstreamUnavailableError);
    }
    expect(await ctx.store.get('contacts_photos:viewer@N01')).toBeUndefined();
  });

  it('skips the upstream call for an empty batch', async () => {
    const ctx = createTestContext('snapshot');
    const session = await ctx.createSession();

    await expect(ctx.photoService.getFriendLatestPhotos(session, [])).resolves.toEqual(new Map());
    expect(ctx.flickr.calls).toEqual([]);
  });
});
