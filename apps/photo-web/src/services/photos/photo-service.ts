import {
  PrivacyFilter,
  selectDisplaySize,
  type FlickrClient,
  type FlickrContact,
  type FlickrCredentials,
  type FlickrGroup,
  type FlickrPhoto,
  type PhotoInfo,
  type PhotoSize,
} from '@photo-relay/flickr-client';

import { AuthRequiredError, UpstreamNotFoundError, UpstreamUnavailableError } from '../../errors';
import type { AppLogger } from '../../telemetry/logger';
import type { AppMetrics } from '../../telemetry/metrics';
import type { CachePolicies, Lookup, ResponseCache } from '../cache';
import type { Session } from '../session';

import type { LatestPhotoStrategy } from './latest-photo-strategy';
import type {
  CallbackParams,
  FriendWithPhoto,
  ListPhotosQuery,
  PhotoListing,
  PhotoPageView,
  PhotoSummary,
  Viewer,
} from './types';
import { callUpstream } from './upstream';

export const DEFAULT_PER_PAGE = 20;

interface PhotoReader {
  credentials: FlickrCredentials | null;
  scope?: string;
}

export interface PhotoServiceOptions {
  callbackUrl: string;
  perPage?: number;
}

/**
 * Request orchestration between the session, the response cache and Flickr.
 * Every gated operation checks the session before touching the cache or the
 * network.
 */
export class PhotoService {
  private readonly perPage: number;

  constructor(
    private readonly client: FlickrClient,
    private readonly cache: ResponseCache,
    private readonly policies: CachePolicies,
    private readonly latestPhotos: LatestPhotoStrategy,
    private readonly metrics: AppMetrics,
    private readonly logger: AppLogger,
    private readonly options: PhotoServiceOptions,
  ) {
    this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
  }

  /** The signed-in user's own stream, or the public recent feed for anonymous visitors. */
  async listPhotos(session: Session, query: ListPhotosQuery): Promise<PhotoListing> {
    const credentials = session.credentials();

    if (!credentials) {
      const page = await this.upstream('flickr.photos.getRecent', () =>
        this.client.fetchRecentPhotos({ page: query.page, perPage: this.perPage }),
      );
      return { ...page, scope: 'recent', privacy: query.privacy };
    }

    const page = await this.upstream('flickr.photos.search', () =>
      this.client.fetchOwnPhotos(credentials, {
        page: query.page,
        perPage: this.perPage,
        privacyFilter: PrivacyFilter[query.privacy],
      }),
    );
    return { ...page, scope: 'own', privacy: query.privacy };
  }

  /**
   * Identity of the signed-in user. Taken from the session when the OAuth
   * exchange recorded it; otherwise asked of Flickr once and written back.
   */
  async resolveViewer(session: Session): Promise<Viewer | null> {
    const credentials = session.credentials();
    if (!credentials) {
      return null;
    }

    const record = session.get();
    if (record.nsid) {
      return { nsid: record.nsid, username: record.username ?? '' };
    }

    const user = await this.upstream('flickr.test.login', () => this.client.fetchUserInfo(credentials));
    if (!user) {
      this.logger.warn('Flickr did not recognise the session access token');
      return null;
    }

    await session.mutate((draft) => ({ ...draft, nsid: user.nsid, username: user.username }));
    return user;
  }

  async listContacts(session: Session): Promise<FlickrContact[]> {
    const credentials = this.requireCredentials(session);
    return this.upstream('flickr.contacts.getList', () => this.client.fetchContacts(credentials));
  }

  async listFriendsWithLatestPhotos(session: Session, signal?: AbortSignal): Promise<FriendWithPhoto[]> {
    const contacts = await this.listContacts(session);
    const latest = await this.getFriendLatestPhotos(
      session,
      contacts.map((contact) => contact.nsid),
      signal,
    );

    return contacts.map((contact) => ({ contact, latestPhoto: latest.get(contact.nsid) }));
  }

  async listGroups(session: Session): Promise<FlickrGroup[]> {
    const credentials = this.requireCredentials(session);
    const viewer = await this.requireViewer(session);
    return this.upstream('flickr.people.getGroups', () => this.client.fetchGroups(credentials, viewer.nsid));
  }

  async getPhotoDetails(session: Session, photoId: string): Promise<PhotoInfo> {
    const reader = await this.photoReader(session);
    return unwrap(await this.lookupDetails(reader, photoId));
  }

  async getPhotoSummary(session: Session, photoId: string): Promise<PhotoSummary> {
    const photo = await this.getPhotoDetails(session, photoId);

    return {
      tags: photo.tags,
      views: photo.views,
      comments: photo.comments,
      description: photo.description,
    };
  }

  /** Details plus the best display image. A sizes failure only loses the image. */
  async getPhotoPage(session: Session, photoId: string): Promise<PhotoPageView> {
    const reader = await this.photoReader(session);
    const [details, sizes] = await Promise.all([
      this.lookupDetails(reader, photoId),
      this.lookupSizes(reader, photoId),
    ]);
    const photo = unwrap(details);

    if (sizes.status === 'unavailable') {
      this.logger.warn({ photoId }, 'Rendering photo page without sizes');
    }

    const selected = sizes.status === 'found' ? selectDisplaySize(sizes.value) : undefined;
    return { photo, imageUrl: selected?.source };
  }

  async getFriendLatestPhotos(
    session: Session,
    nsids: readonly string[],
    signal?: AbortSignal,
  ): Promise<Map<string, Lookup<FlickrPhoto>>> {
    const credentials = this.requireCredentials(session);

    return this.latestPhotos.resolve(
      {
        credentials,
        viewer: () => this.requireViewer(session),
        signal,
      },
      nsids,
    );
  }

  async getFriendLatestPhoto(session: Session, nsid: string): Promise<FlickrPhoto> {
    const results = await this.getFriendLatestPhotos(session, [nsid]);
    const lookup = results.get(nsid);

    if (!lookup) {
      throw new UpstreamNotFoundError(this.policies.friendLatestPhoto.notFoundMessage);
    }

    return unwrap(lookup);
  }

  async getPhotoSizesBatch(
    session: Session,
    photoIds: readonly string[],
    signal?: AbortSignal,
  ): Promise<Map<string, Lookup<PhotoSize[]>>> {
    const credentials = this.requireCredentials(session);
    const viewer = await this.requireViewer(session);

    return this.cache.getOrFetchMany(
      this.policies.photoSizes,
      photoIds,
      (photoId) =>
        this.upstream('flickr.photos.getSizes', () =>
          this.client.fetchPhotoSizes(credentials, photoId, { signal }),
        ),
      viewer.nsid,
    );
  }

  /** Start the OAuth dance and return the Flickr URL the browser should visit. */
  async beginLogin(session: Session): Promise<string> {
    const requestToken = await this.upstream('oauth.request_token', () =>
      this.client.getRequestToken(this.options.callbackUrl),
    );

    if (!requestToken) {
      throw new UpstreamUnavailableError('Flickr did not issue a request token');
    }

    await session.mutate((draft) => ({
      ...draft,
      requestToken: requestToken.token,
      requestTokenSecret: requestToken.tokenSecret,
    }));

    return this.client.buildAuthorizeUrl(requestToken.token);
  }

  /**
   * Finish the OAuth dance. Resolves `false`, leaving the session as it was,
   * when the callback does not match the pending request token.
   */
  async completeLogin(session: Session, params: CallbackParams): Promise<boolean> {
    const { oauthToken, oauthVerifier } = params;
    const { requestToken, requestTokenSecret } = session.get();

    if (!oauthToken || !oauthVerifier) {
      return false;
    }

    if (!requestToken || !requestTokenSecret || requestToken !== oauthToken) {
      this.logger.warn('OAuth callback does not match the pending request token');
      return false;
    }

    const access = await this.upstream('oauth.access_token', () =>
      this.client.getAccessToken({ token: requestToken, tokenSecret: requestTokenSecret }, oauthVerifier),
    );

    if (!access) {
      this.logger.warn('Flickr refused the OAuth verifier');
      return false;
    }

    await session.mutate(() => ({
      accessToken: access.token,
      accessTokenSecret: access.tokenSecret,
      nsid: access.nsid,
      username: access.username,
    }));

    return true;
  }

  async logout(session: Session): Promise<void> {
    await session.destroy();
  }

  private requireCredentials(session: Session): FlickrCredentials {
    const credentials = session.credentials();
    if (!credentials) {
      throw new AuthRequiredError();
    }

    return credentials;
  }

  private async requireViewer(session: Session): Promise<Viewer> {
    const viewer = await this.resolveViewer(session);
    if (!viewer) {
      throw new AuthRequiredError();
    }

    return viewer;
  }

  /**
   * What Flickr shows a signed request depends on who signed it, so signed
   * reads cache under the viewer's NSID and anonymous reads share the plain key.
   */
  private async photoReader(session: Session): Promise<PhotoReader> {
    const credentials = session.credentials();
    if (!credentials) {
      return { credentials: null };
    }

    const viewer = await this.requireViewer(session);
    return { credentials, scope: viewer.nsid };
  }

  private lookupDetails({ credentials, scope }: PhotoReader, photoId: string): Promise<Lookup<PhotoInfo>> {
    return this.cache.getOrFetch(
      this.policies.photoDetails,
      photoId,
      () => this.upstream('flickr.photos.getInfo', () => this.client.fetchPhotoInfo(credentials, photoId)),
      scope,
    );
  }

  private lookupSizes({ credentials, scope }: PhotoReader, photoId: string): Promise<Lookup<PhotoSize[]>> {
    return this.cache.getOrFetch(
      this.policies.photoSizes,
      photoId,
      () => this.upstream('flickr.photos.getSizes', () => this.client.fetchPhotoSizes(credentials, photoId)),
      scope,
    );
  }

  private upstream<T>(method: string, operation: () => Promise<T>): Promise<T> {
    return callUpstream(this.metrics, method, operation);
  }
}

function unwrap<T>(lookup: Lookup<T>): T {
  switch (lookup.status) {
    case 'found':
      return lookup.value;
    case 'not_found':
      throw new UpstreamNotFoundError(lookup.message);
    case 'unavailable':
      throw lookup.error;
  }
}
