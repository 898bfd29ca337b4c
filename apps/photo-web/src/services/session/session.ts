import { randomBytes } from 'node:crypto';

import type { FlickrCredentials } from '@photo-relay/flickr-client';
import { z } from 'zod';

import type { AppLogger } from '../../telemetry/logger';
import type { KeyValueStore } from '../store';

/** Default expiry for session records (24 hours). */
export const DEFAULT_SESSION_TTL_SECONDS = 24 * 60 * 60;

export const SESSION_COOKIE_NAME = 'session_id';

const SESSION_ID_BYTES = 32;

const sessionRecordSchema = z.object({
  accessToken: z.string().optional(),
  accessTokenSecret: z.string().optional(),
  nsid: z.string().optional(),
  username: z.string().optional(),
  requestToken: z.string().optional(),
  requestTokenSecret: z.string().optional(),
});

/** Persisted per-browser state. */
export type SessionRecord = z.infer<typeof sessionRecordSchema>;

export function sessionKey(sessionId: string): string {
  return `session:${sessionId}`;
}

/** URL-safe identifier carrying 256 bits of entropy. */
export function generateSessionId(): string {
  return randomBytes(SESSION_ID_BYTES).toString('base64url');
}

export function isAuthenticated(record: SessionRecord): boolean {
  return isFilled(record.accessToken) && isFilled(record.accessTokenSecret);
}

export function credentialsOf(record: SessionRecord): FlickrCredentials | null {
  const { accessToken, accessTokenSecret } = record;
  if (!accessToken || !accessTokenSecret) {
    return null;
  }

  return { token: accessToken, tokenSecret: accessTokenSecret };
}

function isFilled(value: string | undefined): boolean {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Request-scoped handle on a session record. Reads come from the copy loaded
 * at resolution time; `mutate` and `destroy` write straight through to the
 * store, and `mutate` refreshes the TTL.
 */
export class Session {
  private record: SessionRecord;

  constructor(
    readonly id: string,
    record: SessionRecord,
    private readonly store: KeyValueStore,
    private readonly ttlSeconds: number,
  ) {
    this.record = record;
  }

  get(): SessionRecord {
    return { ...this.record };
  }

  get isAuthenticated(): boolean {
    return isAuthenticated(this.record);
  }

  credentials(): FlickrCredentials | null {
    return credentialsOf(this.record);
  }

  async mutate(update: (draft: SessionRecord) => SessionRecord): Promise<SessionRecord> {
    const next = update({ ...this.record });
    await this.store.set(sessionKey(this.id), JSON.stringify(next), this.ttlSeconds);
    this.record = next;
    return { ...next };
  }

  async destroy(): Promise<void> {
    await this.store.delete(sessionKey(this.id));
    this.record = {};
  }
}

export interface SessionManagerOptions {
  ttlSeconds?: number;
  generateId?: () => string;
}

/** Maps an inbound cookie value to a {@link Session}. */
export class SessionManager {
  private readonly ttlSeconds: number;
  private readonly generateId: () => string;

  constructor(
    private readonly store: KeyValueStore,
    private readonly logger: AppLogger,
    options: SessionManagerOptions = {},
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
    this.generateId = options.generateId ?? generateSessionId;
  }

  /**
   * Absent cookies get a fresh identifier and an empty record. A known cookie
   * with no stored record keeps its identifier so later writes land under it.
   */
  async resolve(cookieValue: string | undefined): Promise<Session> {
    if (!cookieValue) {
      return new Session(this.generateId(), {}, this.store, this.ttlSeconds);
    }

    const raw = await this.store.get(sessionKey(cookieValue));
    return new Session(cookieValue, this.parse(raw), this.store, this.ttlSeconds);
  }

  private parse(raw: string | undefined): SessionRecord {
    if (!raw) {
      return {};
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ error }, 'Discarding unparsable session record');
      return {};
    }

    const result = sessionRecordSchema.safeParse(payload);
    if (!result.success) {
      this.logger.warn({ issues: result.error.issues }, 'Discarding invalid session record');
      return {};
    }

    return result.data;
  }
}
