import { AuthRequiredError } from '../errors';
import type { PhotoService } from '../services/photos';
import type { Session, SessionManager } from '../services/session';
import type { PhotoWebFastifyInstance } from '../server/fastify';

import { parseIdentifierList } from './payload-schemas';
import { toBatchPayload } from './serializers';
import { abortOnDisconnect, openSession, type SessionCookieOptions } from './session-cookie';

export interface ApiRouteContext {
  service: PhotoService;
  sessions: SessionManager;
  cookie: SessionCookieOptions;
  rateLimit?: {
    max: number;
    timeWindow: string | number;
  };
}

/**
 * JSON fragments fetched by the pages: photo details, a contact's latest
 * photo, and the two batch lookups. Failures answer `{ error, message }`
 * with the matching status.
 */
export async function registerApiRoutes(app: PhotoWebFastifyInstance, context: ApiRouteContext): Promise<void> {
  const config = {
    surface: 'api' as const,
    rateLimit: context.rateLimit,
  };

  app.get<{ Params: { id: string } }>('/photo_details/:id', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    return context.service.getPhotoSummary(session, request.params.id);
  });

  app.get<{ Params: { nsid: string } }>('/friend_latest_photo/:nsid', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    return context.service.getFriendLatestPhoto(session, request.params.nsid);
  });

  app.post<{ Body: unknown }>('/friend_latest_photos', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    requireSignedIn(session);
    const nsids = parseIdentifierList(request.body, 'contact identifiers');

    const results = await context.service.getFriendLatestPhotos(session, nsids, abortOnDisconnect(reply));
    return toBatchPayload(results);
  });

  app.post<{ Body: unknown }>('/batch_photo_sizes', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    requireSignedIn(session);
    const photoIds = parseIdentifierList(request.body, 'photo identifiers');

    const results = await context.service.getPhotoSizesBatch(session, photoIds, abortOnDisconnect(reply));
    return toBatchPayload(results);
  });
}

/** Batch bodies are only looked at once the caller is known to be signed in. */
function requireSignedIn(session: Session): void {
  if (!session.isAuthenticated) {
    throw new AuthRequiredError();
  }
}
