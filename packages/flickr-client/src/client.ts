import { FlickrUnavailableError, SERVICE_UNAVAILABLE_CODE } from './errors';
import {
  PHOTO_LIST_EXTRAS,
  asRecord,
  normalizeContacts,
  normalizeGroups,
  normalizePhotoInfo,
  normalizePhotoList,
  normalizePhotoPage,
  normalizeSizes,
  normalizeUser,
  parseAccessTokenResponse,
  parseRequestTokenResponse,
  readNumber,
  readString,
} from './normalizers';
import { OAuthSigner, appendQuery } from './oauth';
import type {
  AccessToken,
  FlickrClientConfig,
  FlickrContact,
  FlickrCredentials,
  FlickrGroup,
  FlickrParams,
  FlickrPhoto,
  FlickrUser,
  HttpClient,
  HttpRequestInitLike,
  HttpResponseLike,
  OwnPhotosQuery,
  PhotoInfo,
  PhotoPage,
  PhotoSize,
  RecentPhotosQuery,
  RequestOptions,
  RequestToken,
} from './types';

const DEFAULT_REST_URL = 'https://api.flickr.com/services/rest';
const DEFAULT_OAUTH_BASE_URL = 'https://www.flickr.com/services/oauth';

/** Upper bound Flickr accepts for `flickr.photos.getContactsPhotos`. */
export const MAX_CONTACTS_PHOTOS = 50;

type Envelope = Record<string, unknown>;

/**
 * Typed wrapper around the Flickr REST API. Every operation resolves to a
 * normalised structure, or to `null`/`[]` when Flickr has nothing to return
 * (missing entity, failed `stat`, 4xx, unexpected shape). Only an unreachable
 * Flickr rejects, with {@link FlickrUnavailableError}.
 */
export class FlickrClient {
  private readonly apiKey: string;
  private readonly restUrl: string;
  private readonly oauthBaseUrl: string;
  private readonly httpClient: HttpClient;
  private readonly signer: OAuthSigner;

  constructor(config: FlickrClientConfig) {
    if (!config?.apiKey) {
      throw new Error('FlickrClient requires an apiKey.');
    }

    if (!config.apiSecret) {
      throw new Error('FlickrClient requires an apiSecret.');
    }

    this.apiKey = config.apiKey;
    this.restUrl = (config.restUrl ?? DEFAULT_REST_URL).replace(/\/$/, '');
    this.oauthBaseUrl = (config.oauthBaseUrl ?? DEFAULT_OAUTH_BASE_URL).replace(/\/$/, '');
    this.httpClient = config.httpClient ?? defaultHttpClient;
    this.signer = new OAuthSigner(config.apiKey, config.apiSecret);
  }

  async fetchUserInfo(credentials: FlickrCredentials, options?: RequestOptions): Promise<FlickrUser | null> {
    const envelope = await this.call('flickr.test.login', {}, credentials, options);
    return envelope ? normalizeUser(envelope) : null;
  }

  async fetchContacts(credentials: FlickrCredentials, options?: RequestOptions): Promise<FlickrContact[]> {
    const envelope = await this.call('flickr.contacts.getList', {}, credentials, options);
    return envelope ? normalizeContacts(envelope) : [];
  }

  /** The authenticated user's own photos, optionally narrowed by privacy level. */
  async fetchOwnPhotos(
    credentials: FlickrCredentials,
    query: OwnPhotosQuery,
    options?: RequestOptions,
  ): Promise<PhotoPage> {
    const params: FlickrParams = {
      user_id: 'me',
      page: query.page,
      per_page: query.perPage,
      extras: PHOTO_LIST_EXTRAS,
    };
    if (query.privacyFilter !== undefined) {
      params.privacy_filter = query.privacyFilter;
    }

    const envelope = await this.call('flickr.photos.search', params, credentials, options);
    return envelope
      ? normalizePhotoPage(envelope, query)
      : { photos: [], page: query.page, pages: 1, perPage: query.perPage, total: 0 };
  }

  /** Public recent uploads, used for the anonymous landing page. */
  async fetchRecentPhotos(query: RecentPhotosQuery, options?: RequestOptions): Promise<PhotoPage> {
    const envelope = await this.call(
      'flickr.photos.getRecent',
      { page: query.page, per_page: query.perPage, extras: PHOTO_LIST_EXTRAS },
      null,
      options,
    );

    return envelope
      ? normalizePhotoPage(envelope, query)
      : { photos: [], page: query.page, pages: 1, perPage: query.perPage, total: 0 };
  }

  async fetchPhotosOfUser(
    credentials: FlickrCredentials,
    nsid: string,
    perPage = 1,
    options?: RequestOptions,
  ): Promise<FlickrPhoto[]> {
    const envelope = await this.call(
      'flickr.people.getPhotos',
      { user_id: nsid, per_page: perPage, extras: PHOTO_LIST_EXTRAS },
      credentials,
      options,
    );

    return envelope ? normalizePhotoList(envelope) : [];
  }

  async fetchPhotoInfo(
    credentials: FlickrCredentials | null,
    photoId: string,
    options?: RequestOptions,
  ): Promise<PhotoInfo | null> {
    const envelope = await this.call('flickr.photos.getInfo', { photo_id: photoId }, credentials, options);
    return envelope ? normalizePhotoInfo(envelope) : null;
  }

  /** Resolves to `null` when Flickr lists no sizes for the photo. */
  async fetchPhotoSizes(
    credentials: FlickrCredentials | null,
    photoId: string,
    options?: RequestOptions,
  ): Promise<PhotoSize[] | null> {
    const envelope = await this.call('flickr.photos.getSizes', { photo_id: photoId }, credentials, options);
    if (!envelope) {
      return null;
    }

    const sizes = normalizeSizes(envelope);
    return sizes.length > 0 ? sizes : null;
  }

  /** One recent photo per contact, newest first. */
  async fetchContactsPhotos(
    credentials: FlickrCredentials,
    count = MAX_CONTACTS_PHOTOS,
    options?: RequestOptions,
  ): Promise<FlickrPhoto[]> {
    const envelope = await this.call(
      'flickr.photos.getContactsPhotos',
      {
        count: Math.min(Math.max(count, 1), MAX_CONTACTS_PHOTOS),
        single_photo: 1,
        extras: PHOTO_LIST_EXTRAS,
      },
      credentials,
      options,
    );

    return envelope ? normalizePhotoList(envelope) : [];
  }

  async fetchGroups(
    credentials: FlickrCredentials,
    nsid: string,
    options?: RequestOptions,
  ): Promise<FlickrGroup[]> {
    const envelope = await this.call(
      'flickr.people.getGroups',
      { user_id: nsid, extras: 'privacy,throttle,restrictions' },
      credentials,
      options,
    );

    return envelope ? normalizeGroups(envelope) : [];
  }

  /** First leg of the OAuth 1.0a handshake. */
  async getRequestToken(callbackUrl: string, options?: RequestOptions): Promise<RequestToken | null> {
    const body = await this.oauthRequest('request_token', { oauth_callback: callbackUrl }, undefined, options);
    return body === null ? null : parseRequestTokenResponse(body);
  }

  buildAuthorizeUrl(requestToken: string, perms: 'read' | 'write' | 'delete' = 'read'): string {
    return appendQuery(`${this.oauthBaseUrl}/authorize`, { oauth_token: requestToken, perms });
  }

  /** Exchange an authorised request token and its verifier for an access token. */
  async getAccessToken(
    requestToken: FlickrCredentials,
    verifier: string,
    options?: RequestOptions,
  ): Promise<AccessToken | null> {
    const body = await this.oauthRequest('access_token', { oauth_verifier: verifier }, requestToken, options);
    return body === null ? null : parseAccessTokenResponse(body);
  }

  private async call(
    method: string,
    params: FlickrParams,
    credentials: FlickrCredentials | null,
    options?: RequestOptions,
  ): Promise<Envelope | null> {
    const fullParams: FlickrParams = {
      ...params,
      method,
      format: 'json',
      nojsoncallback: 1,
    };

    let url: string;
    let headers: Record<string, string> = {};
    if (credentials) {
      const signed = this.signer.sign(this.restUrl, fullParams, credentials);
      url = signed.url;
      headers = signed.headers;
    } else {
      url = appendQuery(this.restUrl, { ...fullParams, api_key: this.apiKey });
    }

    const response = await this.send(method, url, { method: 'GET', headers, signal: options?.signal });
    if (!response.ok) {
      return null;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      // Only a malformed body means "no data"; a body cut short by an abort or reset does not.
      if (error instanceof SyntaxError) {
        return null;
      }
      throw new FlickrUnavailableError(method, { cause: error });
    }

    const envelope = asRecord(body);
    if (!envelope) {
      return null;
    }

    if (readString(envelope, 'stat') !== 'ok') {
      const errorCode = readNumber(envelope, 'code');
      if (errorCode === SERVICE_UNAVAILABLE_CODE) {
        throw new FlickrUnavailableError(method, { errorCode });
      }
      return null;
    }

    return envelope;
  }

  private async oauthRequest(
    endpoint: 'request_token' | 'access_token',
    params: FlickrParams,
    token: FlickrCredentials | undefined,
    options?: RequestOptions,
  ): Promise<string | null> {
    const signed = this.signer.sign(`${this.oauthBaseUrl}/${endpoint}`, params, token);
    const response = await this.send(`oauth.${endpoint}`, signed.url, {
      method: 'GET',
      headers: signed.headers,
      signal: options?.signal,
    });

    if (!response.ok) {
      return null;
    }

    try {
      return await response.text();
    } catch (error) {
      throw new FlickrUnavailableError(`oauth.${endpoint}`, { cause: error });
    }
  }

  private async send(method: string, url: string, init: HttpRequestInitLike): Promise<HttpResponseLike> {
    let response: HttpResponseLike;
    try {
      response = await this.httpClient(url, init);
    } catch (error) {
      throw new FlickrUnavailableError(method, { cause: error });
    }

    if (response.status >= 500) {
      throw new FlickrUnavailableError(method, { status: response.status });
    }

    return response;
  }
}

const defaultHttpClient: HttpClient = async (url, init?: HttpRequestInitLike) => {
  const response = await fetch(url, {
    method: init?.method,
    headers: init?.headers,
    body: init?.body,
    signal: init?.signal,
  });

  const textClone = response.clone();

  return {
    ok: response.ok,
    status: response.status,
    json: () => response.json(),
    text: () => textClone.text(),
  };
};
