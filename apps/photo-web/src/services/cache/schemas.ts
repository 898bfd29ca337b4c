import type { FlickrPhoto, PhotoInfo, PhotoSize } from '@photo-relay/flickr-client';
import { z } from 'zod';

/**
 * Schemas for values read back from the cache. Anything that no longer
 * matches (an older deploy wrote it, or it was edited by hand) is treated as
 * a miss rather than passed on.
 */
export const photoSchema: z.ZodType<FlickrPhoto> = z.object({
  id: z.string(),
  owner: z.string(),
  ownerName: z.string().optional(),
  title: z.string(),
  description: z.string(),
  thumbnailUrl: z.string().optional(),
  mediumUrl: z.string().optional(),
  dateUploaded: z.string().optional(),
  dateTaken: z.string().optional(),
  isPublic: z.boolean(),
  isFriend: z.boolean(),
  isFamily: z.boolean(),
});

export const photoInfoSchema: z.ZodType<PhotoInfo> = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  ownerNsid: z.string(),
  ownerName: z.string(),
  tags: z.array(z.string()),
  views: z.number().optional(),
  comments: z.number(),
  dateUploaded: z.string().optional(),
  dateTaken: z.string().optional(),
  pageUrl: z.string().optional(),
});

const photoSizeSchema: z.ZodType<PhotoSize> = z.object({
  label: z.string(),
  width: z.number(),
  height: z.number(),
  source: z.string(),
});

export const photoSizesSchema: z.ZodType<PhotoSize[]> = z.array(photoSizeSchema);

export const contactsPhotosSchema: z.ZodType<FlickrPhoto[]> = z.array(photoSchema);

/** Wire form of every cache entry: a value, or a negative sentinel. */
export const cacheEnvelopeSchema = z.discriminatedUnion('found', [
  z.object({ found: z.literal(true), value: z.unknown() }),
  z.object({ found: z.literal(false), error: z.string() }),
]);
