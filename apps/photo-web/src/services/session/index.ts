export {
  DEFAULT_SESSION_TTL_SECONDS,
  SESSION_COOKIE_NAME,
  Session,
  SessionManager,
  credentialsOf,
  generateSessionId,
  isAuthenticated,
  sessionKey,
  type SessionManagerOptions,
  type SessionRecord,
} from './session';
