import type { PhotoService } from '../services/photos';
import type { SessionManager } from '../services/session';
import type { PhotoWebFastifyInstance } from '../server/fastify';

import { openSession, type SessionCookieOptions } from './session-cookie';

export interface AuthRouteContext {
  service: PhotoService;
  sessions: SessionManager;
  cookie: SessionCookieOptions;
}

interface CallbackQuery {
  oauth_token?: string;
  oauth_verifier?: string;
}

/** The three legs of the Flickr OAuth dance plus logout. */
export async function registerAuthRoutes(app: PhotoWebFastifyInstance, context: AuthRouteContext): Promise<void> {
  const config = { surface: 'page' as const };

  app.get('/login', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    const authorizeUrl = await context.service.beginLogin(session);

    return reply.redirect(authorizeUrl);
  });

  app.get<{ Querystring: CallbackQuery }>('/callback', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    const completed = await context.service.completeLogin(session, {
      oauthToken: request.query.oauth_token,
      oauthVerifier: request.query.oauth_verifier,
    });

    if (completed) {
      request.log.info('Flickr login completed');
    }

    return reply.redirect('/');
  });

  app.get('/logout', { config }, async (request, reply) => {
    const session = await openSession(request, reply, context.sessions, context.cookie);
    await context.service.logout(session);

    return reply.redirect('/');
  });
}
