import { MAX_CONTACTS_PHOTOS, type FlickrClient, type FlickrPhoto } from '@photo-relay/flickr-client';

import type { FriendsPhotoStrategy } from '../../config';
import type { AppMetrics } from '../../telemetry/metrics';
import type { CachePolicies, Lookup, ResponseCache } from '../cache';

import type { LatestPhotoContext } from './types';
import { callUpstream } from './upstream';

/** Answers "what did each of these contacts post last?". */
export interface LatestPhotoStrategy {
  readonly name: FriendsPhotoStrategy;
  resolve(context: LatestPhotoContext, nsids: readonly string[]): Promise<Map<string, Lookup<FlickrPhoto>>>;
}

/** One cached `flickr.people.getPhotos` call per contact, fetched concurrently. */
export class PerContactLatestPhotoStrategy implements LatestPhotoStrategy {
  readonly name = 'per-contact';

  constructor(
    private readonly client: FlickrClient,
    private readonly cache: ResponseCache,
    private readonly policies: CachePolicies,
    private readonly metrics: AppMetrics,
  ) {}

  resolve(context: LatestPhotoContext, nsids: readonly string[]): Promise<Map<string, Lookup<FlickrPhoto>>> {
    return this.cache.getOrFetchMany(this.policies.friendLatestPhoto, nsids, async (nsid) => {
      const photos = await callUpstream(this.metrics, 'flickr.people.getPhotos', () =>
        this.client.fetchPhotosOfUser(context.credentials, nsid, 1, { signal: context.signal }),
      );
      return photos[0] ?? null;
    });
  }
}

/**
 * A single `flickr.photos.getContactsPhotos` call cached per viewer and
 * indexed by owner. Up to one TTL stale, but one upstream call regardless of
 * how many contacts are asked for.
 */
export class SnapshotLatestPhotoStrategy implements LatestPhotoStrategy {
  readonly name = 'snapshot';

  constructor(
    private readonly client: FlickrClient,
    private readonly cache: ResponseCache,
    private readonly policies: CachePolicies,
    private readonly metrics: AppMetrics,
  ) {}

  async resolve(context: LatestPhotoContext, nsids: readonly string[]): Promise<Map<string, Lookup<FlickrPhoto>>> {
    const result = new Map<string, Lookup<FlickrPhoto>>();
    const unique = Array.from(new Set(nsids));

    if (unique.length === 0) {
      return result;
    }

    const viewer = await context.viewer();
    const snapshot = await this.cache.getOrFetch(this.policies.contactsPhotos, viewer.nsid, async () => {
      const photos = await callUpstream(this.metrics, 'flickr.photos.getContactsPhotos', () =>
        this.client.fetchContactsPhotos(context.credentials, MAX_CONTACTS_PHOTOS, { signal: context.signal }),
      );
      return photos.length > 0 ? photos : null;
    });

    const byOwner = new Map<string, FlickrPhoto>();
    if (snapshot.status === 'found') {
      for (const photo of snapshot.value) {
        if (!byOwner.has(photo.owner)) {
          byOwner.set(photo.owner, photo);
        }
      }
    }

    const notFound = this.policies.friendLatestPhoto.notFoundMessage;
    for (const nsid of unique) {
      if (snapshot.status === 'unavailable') {
        result.set(nsid, snapshot);
        continue;
      }

      const photo = byOwner.get(nsid);
      result.set(nsid, photo ? { status: 'found', value: photo } : { status: 'not_found', message: notFound });
    }

    return result;
  }
}

export function createLatestPhotoStrategy(
  name: FriendsPhotoStrategy,
  client: FlickrClient,
  cache: ResponseCache,
  policies: CachePolicies,
  metrics: AppMetrics,
): LatestPhotoStrategy {
  return name === 'snapshot'
    ? new SnapshotLatestPhotoStrategy(client, cache, policies, metrics)
    : new PerContactLatestPhotoStrategy(client, cache, policies, metrics);
}
