import type { PrivacyLevel } from '@photo-relay/flickr-client';

import type { PhotoService } from '../services/photos';
import type { Session, SessionManager } from '../services/session';
import type { PhotoWebFastifyInstance } from '../server/fastify';
import {
  FriendsPage,
  GroupsPage,
  IndexPage,
  PhotoPage,
  renderPage,
  type PrivacyFilterLink,
} from '../views';

import { parseListingQuery, privacyQueryValue } from './payload-schemas';
import { abortOnDisconnect, openSession, type SessionCookieOptions } from './session-cookie';

export interface PageRouteContext {
  service: PhotoService;
  sessions: SessionManager;
  cookie: SessionCookieOptions;
  now?: () => Date;
}

const PRIVACY_LABELS: Array<[PrivacyLevel, string]> = [
  ['public', 'Public'],
  ['friends', 'Friends'],
  ['family', 'Family'],
  ['friendsFamily', 'Friends & family'],
  ['private', 'Private'],
];

function listingHref(page: number, privacy: PrivacyLevel): string {
  return `/?page=${page}&privacy=${privacyQueryValue(privacy)}`;
}

function viewerName(session: Session): string | undefined {
  if (!session.isAuthenticated) {
    return undefined;
  }

  const { username, nsid } = session.get();
  return username || nsid || 'Flickr user';
}

/** Server-rendered HTML pages. A failed auth gate redirects to `/login`. */
export async function registerPageRoutes(app: PhotoWebFastifyInstance, context: PageRouteContext): Promise<void> {
  const config = { surface: 'page' as const };
  const now = context.now ?? (() => new Date());

  app.get('/', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    const query = parseListingQuery(request.query);
    const listing = await context.service.listPhotos(session, query);

    const filters: PrivacyFilterLink[] =
      listing.scope === 'own'
        ? PRIVACY_LABELS.map(([level, label]) => ({
            label,
            href: listingHref(1, level),
            active: level === query.privacy,
          }))
        : [];

    const html = renderPage(IndexPage, {
      viewer: viewerName(session),
      listing,
      filters,
      previousHref: listing.page > 1 ? listingHref(listing.page - 1, query.privacy) : undefined,
      nextHref: listing.page < listing.pages ? listingHref(listing.page + 1, query.privacy) : undefined,
      now: now(),
    });

    return reply.type('text/html; charset=utf-8').send(html);
  });

  app.get('/friends', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    const friends = await context.service.listFriendsWithLatestPhotos(session, abortOnDisconnect(reply));

    const html = renderPage(FriendsPage, { viewer: viewerName(session), friends, now: now() });
    return reply.type('text/html; charset=utf-8').send(html);
  });

  app.get('/groups', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    const groups = await context.service.listGroups(session);

    const html = renderPage(GroupsPage, { viewer: viewerName(session), groups });
    return reply.type('text/html; charset=utf-8').send(html);
  });

  app.get<{ Params: { id: string } }>('/photo/:id', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    const view = await context.service.getPhotoPage(session, request.params.id);

    const html = renderPage(PhotoPage, { viewer: viewerName(session), view, now: now() });
    return reply.type('text/html; charset=utf-8').send(html);
  });
}
