import type { PrivacyLevel } from '@photo-relay/flickr-client';
import { z } from 'zod';

import { BadRequestError } from '../errors';

/** Upper bound on identifiers accepted by one batch request. */
export const MAX_BATCH_IDENTIFIERS = 500;

const identifierListSchema = z.array(z.string().trim().min(1)).max(MAX_BATCH_IDENTIFIERS);

/**
 * Batch endpoints take a bare JSON array of identifiers. Anything else is
 * rejected before the session is consulted for upstream work.
 */
export function parseIdentifierList(payload: unknown, label: string): string[] {
  const result = identifierListSchema.safeParse(payload);

  if (!result.success) {
    throw new BadRequestError(
      `Expected a JSON array of at most ${MAX_BATCH_IDENTIFIERS} non-empty ${label}`,
    );
  }

  return result.data;
}

const privacyQueryValues = {
  public: 'public',
  friends: 'friends',
  family: 'family',
  friendsfamily: 'friendsFamily',
  private: 'private',
} as const satisfies Record<string, PrivacyLevel>;

export type PrivacyQueryValue = keyof typeof privacyQueryValues;

const listingQuerySchema = z.object({
  page: z.coerce.number().int().positive().catch(1),
  privacy: z
    .enum(['public', 'friends', 'family', 'friendsfamily', 'private'])
    .catch('public'),
});

export interface ListingQuery {
  page: number;
  privacy: PrivacyLevel;
}

/** Query of the photo listing; out-of-range values fall back to the first public page. */
export function parseListingQuery(query: unknown): ListingQuery {
  const parsed = listingQuerySchema.parse(query ?? {});
  return { page: parsed.page, privacy: privacyQueryValues[parsed.privacy] };
}

/** Inverse of {@link parseListingQuery}'s privacy mapping, for building links. */
export function privacyQueryValue(privacy: PrivacyLevel): PrivacyQueryValue {
  return privacy === 'friendsFamily' ? 'friendsfamily' : privacy;
}
