export { FlickrClient, MAX_CONTACTS_PHOTOS } from './client';
export { FlickrUnavailableError, isFlickrUnavailableError } from './errors';
export { PREFERRED_SIZE_LABELS, selectDisplaySize } from './sizes';
export { PrivacyFilter } from './types';
export type {
  AccessToken,
  FlickrClientConfig,
  FlickrContact,
  FlickrCredentials,
  FlickrGroup,
  FlickrPhoto,
  FlickrUser,
  HttpClient,
  HttpRequestInitLike,
  HttpResponseLike,
  OwnPhotosQuery,
  PhotoInfo,
  PhotoPage,
  PhotoSize,
  PrivacyFilterValue,
  PrivacyLevel,
  RecentPhotosQuery,
  RequestOptions,
  RequestToken,
} from './types';
