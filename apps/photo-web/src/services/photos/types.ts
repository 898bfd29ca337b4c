import type {
  FlickrContact,
  FlickrCredentials,
  FlickrPhoto,
  PhotoInfo,
  PhotoPage,
  PrivacyLevel,
} from '@photo-relay/flickr-client';

import type { Lookup } from '../cache';

export interface Viewer {
  nsid: string;
  username: string;
}

export interface PhotoListing extends PhotoPage {
  /** `own` for the signed-in user's stream, `recent` for the public feed. */
  scope: 'own' | 'recent';
  privacy: PrivacyLevel;
}

export interface ListPhotosQuery {
  page: number;
  privacy: PrivacyLevel;
}

export interface FriendWithPhoto {
  contact: FlickrContact;
  latestPhoto?: Lookup<FlickrPhoto>;
}

export interface PhotoSummary {
  tags: string[];
  views?: number;
  comments: number;
  description: string;
}

export interface PhotoPageView {
  photo: PhotoInfo;
  imageUrl?: string;
}

export interface LatestPhotoContext {
  credentials: FlickrCredentials;
  /** Resolves the signed-in user; only strategies that key by viewer call it. */
  viewer: () => Promise<Viewer>;
  signal?: AbortSignal;
}

export interface CallbackParams {
  oauthToken?: string;
  oauthVerifier?: string;
}
