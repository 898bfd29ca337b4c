import type { FlickrPhoto, PhotoInfo, PhotoSize } from '@photo-relay/flickr-client';
import type { z } from 'zod';

import type { AppConfig } from '../../config';

import { contactsPhotosSchema, photoInfoSchema, photoSchema, photoSizesSchema } from './schemas';

/** Sizes never change once Flickr has generated them. */
export const PHOTO_SIZES_TTL_SECONDS = 60 * 60 * 24 * 7;

/** Lifetime of a "confirmed absent" entry. */
export const NEGATIVE_TTL_SECONDS = 120;

export interface CachePolicy<T> {
  /** Key prefix and metrics label. */
  name: string;
  ttlSeconds: number;
  negativeTtlSeconds: number;
  notFoundMessage: string;
  schema: z.ZodType<T>;
}

export interface CachePolicies {
  photoDetails: CachePolicy<PhotoInfo>;
  photoSizes: CachePolicy<PhotoSize[]>;
  friendLatestPhoto: CachePolicy<FlickrPhoto>;
  contactsPhotos: CachePolicy<FlickrPhoto[]>;
}

/**
 * `<policy>:<id>`, or `<policy>:<scope>:<id>` for entries that only hold for
 * one viewer.
 */
export function cacheKey<T>(policy: CachePolicy<T>, id: string, scope?: string): string {
  return scope === undefined ? `${policy.name}:${id}` : `${policy.name}:${scope}:${id}`;
}

export function createCachePolicies(cache: AppConfig['cache']): CachePolicies {
  return {
    photoDetails: {
      name: 'photo_details',
      ttlSeconds: cache.photoDetailsTtlSeconds,
      negativeTtlSeconds: NEGATIVE_TTL_SECONDS,
      notFoundMessage: 'Photo not found',
      schema: photoInfoSchema,
    },
    photoSizes: {
      name: 'photo_sizes',
      ttlSeconds: PHOTO_SIZES_TTL_SECONDS,
      negativeTtlSeconds: NEGATIVE_TTL_SECONDS,
      notFoundMessage: 'No sizes found',
      schema: photoSizesSchema,
    },
    friendLatestPhoto: {
      name: 'friend_latest_photo',
      ttlSeconds: cache.friendsTtlSeconds,
      negativeTtlSeconds: NEGATIVE_TTL_SECONDS,
      notFoundMessage: 'No photo found',
      schema: photoSchema,
    },
    // Keyed by the viewer's NSID: the snapshot is what *their* contacts posted.
    contactsPhotos: {
      name: 'contacts_photos',
      ttlSeconds: cache.friendsTtlSeconds,
      negativeTtlSeconds: NEGATIVE_TTL_SECONDS,
      notFoundMessage: 'No contact photos found',
      schema: contactsPhotosSchema,
    },
  };
}
