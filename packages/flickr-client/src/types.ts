export interface FlickrClientConfig {
  apiKey: string;
  apiSecret: string;
  restUrl?: string;
  oauthBaseUrl?: string;
  httpClient?: HttpClient;
}

export interface HttpRequestInitLike {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type HttpClient = (url: string, init?: HttpRequestInitLike) => Promise<HttpResponseLike>;

/** OAuth access token pair that signs calls on behalf of a user. */
export interface FlickrCredentials {
  token: string;
  tokenSecret: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Values accepted by `privacy_filter` on `flickr.photos.search`.
 */
export const PrivacyFilter = {
  public: 1,
  friends: 2,
  family: 3,
  friendsFamily: 4,
  private: 5,
} as const;

export type PrivacyLevel = keyof typeof PrivacyFilter;
export type PrivacyFilterValue = (typeof PrivacyFilter)[PrivacyLevel];

export interface FlickrUser {
  nsid: string;
  username: string;
}

export interface FlickrContact {
  nsid: string;
  username: string;
  realname?: string;
  iconUrl: string;
  friend: boolean;
  family: boolean;
}

export interface FlickrPhoto {
  id: string;
  owner: string;
  ownerName?: string;
  title: string;
  description: string;
  thumbnailUrl?: string;
  mediumUrl?: string;
  dateUploaded?: string;
  dateTaken?: string;
  isPublic: boolean;
  isFriend: boolean;
  isFamily: boolean;
}

export interface PhotoPage {
  photos: FlickrPhoto[];
  page: number;
  pages: number;
  perPage: number;
  total: number;
}

export interface PhotoInfo {
  id: string;
  title: string;
  description: string;
  ownerNsid: string;
  ownerName: string;
  tags: string[];
  views?: number;
  comments: number;
  dateUploaded?: string;
  dateTaken?: string;
  pageUrl?: string;
}

export interface PhotoSize {
  label: string;
  width: number;
  height: number;
  source: string;
}

export interface FlickrGroup {
  nsid: string;
  name: string;
  members?: number;
  iconUrl: string;
}

export interface OwnPhotosQuery {
  page: number;
  perPage: number;
  privacyFilter?: PrivacyFilterValue;
}

export interface RecentPhotosQuery {
  page: number;
  perPage: number;
}

/** Request token issued at the start of the OAuth dance. */
export interface RequestToken {
  token: string;
  tokenSecret: string;
  callbackConfirmed: boolean;
}

export interface AccessToken extends FlickrCredentials {
  nsid?: string;
  username?: string;
  fullname?: string;
}

export type FlickrParams = Record<string, string | number>;
