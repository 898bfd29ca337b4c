import type { AppConfig, FriendsPhotoStrategy } from '../config';
import { createServer, type PhotoWebFastifyInstance } from '../server';
import { ResponseCache, createCachePolicies, type CachePolicies } from '../services/cache';
import { PhotoService, createLatestPhotoStrategy } from '../services/photos';
import { SessionManager, type Session, type SessionRecord } from '../services/session';
import { InMemoryKeyValueStore } from '../services/store';
import { createLogger, type AppLogger } from '../telemetry/logger';
import { createMetrics, type AppMetrics } from '../telemetry/metrics';

import { FakeFlickr } from './fake-flickr';

export const SIGNED_IN_RECORD: SessionRecord = {
  accessToken: 'user-token',
  accessTokenSecret: 'user-token-secret',
  nsid: 'viewer@N01',
  username: 'viewer',
};

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    env: 'test',
    port: 8000,
    flickr: {
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      callbackUrl: 'http://localhost:8000/callback',
    },
    store: { driver: 'memory' },
    cache: { friendsTtlSeconds: 7200, photoDetailsTtlSeconds: 172800 },
    friendsPhotoStrategy: 'per-contact',
    cookie: { secure: false },
    rateLimit: { max: 1000, timeWindow: '1 minute' },
    logLevel: 'silent',
    ...overrides,
  };
}

export interface TestContext {
  config: AppConfig;
  flickr: FakeFlickr;
  store: InMemoryKeyValueStore;
  logger: AppLogger;
  metrics: AppMetrics;
  cache: ResponseCache;
  policies: CachePolicies;
  sessions: SessionManager;
  photoService: PhotoService;
  /** A persisted session holding `record`, signed in unless told otherwise. */
  createSession(record?: SessionRecord): Promise<Session>;
}

export function createTestContext(strategy: FriendsPhotoStrategy = 'per-contact'): TestContext {
  const config = createTestConfig({ friendsPhotoStrategy: strategy });
  const flickr = new FakeFlickr();
  const client = flickr.createClient();
  const store = new InMemoryKeyValueStore();
  const logger = createLogger({ level: 'silent' });
  const metrics = createMetrics({ collectDefaults: false });
  const cache = new ResponseCache(store, metrics, logger);
  const policies = createCachePolicies(config.cache);
  const latestPhotos = createLatestPhotoStrategy(strategy, client, cache, policies, metrics);
  const photoService = new PhotoService(client, cache, policies, latestPhotos, metrics, logger, {
    callbackUrl: config.flickr.callbackUrl,
  });
  const sessions = new SessionManager(store, logger);

  return {
    config,
    flickr,
    store,
    logger,
    metrics,
    cache,
    policies,
    sessions,
    photoService,
    async createSession(record = SIGNED_IN_RECORD) {
      const session = await sessions.resolve(undefined);
      await session.mutate(() => ({ ...record }));
      return session;
    },
  };
}

/** Fixed clock for rendered pages: 15 April 2025, noon local time. */
export const TEST_NOW = new Date(2025, 3, 15, 12, 0, 0);

export function createTestServer(ctx: TestContext): Promise<PhotoWebFastifyInstance> {
  return createServer({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    sessions: ctx.sessions,
    photoService: ctx.photoService,
    now: () => TEST_NOW,
  });
}
