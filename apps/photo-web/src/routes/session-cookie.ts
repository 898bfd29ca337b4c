import type { FastifyReply, FastifyRequest } from 'fastify';

import { SESSION_COOKIE_NAME, type Session, type SessionManager } from '../services/session';

export interface SessionCookieOptions {
  secure: boolean;
}

/**
 * Resolve the session behind the request cookie and (re)issue the cookie on
 * the reply, so every response carries the identifier it was served under.
 */
export async function openSession(
  request: FastifyRequest,
  reply: FastifyReply,
  sessions: SessionManager,
  cookie: SessionCookieOptions,
): Promise<Session> {
  const session = await sessions.resolve(request.cookies[SESSION_COOKIE_NAME]);

  reply.setCookie(SESSION_COOKIE_NAME, session.id, {
    httpOnly: true,
    path: '/',
    sameSite: 'lax',
    secure: cookie.secure,
  });

  return session;
}

/** Abort signal that fires when the client goes away before the reply is written. */
export function abortOnDisconnect(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();

  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });

  return controller.signal;
}
