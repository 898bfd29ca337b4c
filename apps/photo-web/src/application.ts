import { FlickrClient } from '@photo-relay/flickr-client';

import { loadConfig, type AppConfig } from './config';
import { createServer, type PhotoWebFastifyInstance } from './server';
import { ResponseCache, createCachePolicies } from './services/cache';
import { PhotoService, createLatestPhotoStrategy } from './services/photos';
import { SessionManager } from './services/session';
import { InMemoryKeyValueStore, RedisKeyValueStore, type KeyValueStore } from './services/store';
import { createLogger, type AppLogger } from './telemetry/logger';
import { createMetrics, type AppMetrics } from './telemetry/metrics';

export interface Application {
  config: AppConfig;
  logger: AppLogger;
  metrics: AppMetrics;
  server: PhotoWebFastifyInstance;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Compose the web front-end: configuration, logging and metrics, the shared
 * key-value store, the Flickr client, session and response caches, the photo
 * service and the Fastify server. The returned object exposes lifecycle
 * helpers used by the CLI entrypoint.
 */
export async function createApplication(source: NodeJS.ProcessEnv = process.env): Promise<Application> {
  const config = loadConfig(source);
  const logger = createLogger({ level: config.logLevel });
  const metrics = createMetrics();

  const store = createStore(config);
  const client = new FlickrClient({
    apiKey: config.flickr.apiKey,
    apiSecret: config.flickr.apiSecret,
  });

  const cache = new ResponseCache(store, metrics, logger);
  const policies = createCachePolicies(config.cache);
  const latestPhotos = createLatestPhotoStrategy(config.friendsPhotoStrategy, client, cache, policies, metrics);
  const photoService = new PhotoService(client, cache, policies, latestPhotos, metrics, logger, {
    callbackUrl: config.flickr.callbackUrl,
  });
  const sessions = new SessionManager(store, logger);

  logger.debug(
    { store: config.store.driver, friendsPhotoStrategy: latestPhotos.name },
    'Photo web components wired',
  );

  const server = await createServer({
    config,
    logger,
    metrics,
    sessions,
    photoService,
  });

  return {
    config,
    logger,
    metrics,
    server,
    start: () => startServer(server, config),
    stop: () => stopServer(server, store, logger),
  };
}

/** Listen on all interfaces at the configured port. */
async function startServer(server: PhotoWebFastifyInstance, config: AppConfig): Promise<void> {
  await server.listen({ port: config.port, host: '0.0.0.0' });
}

/**
 * Shut down the HTTP server and close the Redis connection when there is
 * one. A failing Redis close is logged so signal-driven shutdowns finish.
 */
async function stopServer(server: PhotoWebFastifyInstance, store: KeyValueStore, logger: AppLogger): Promise<void> {
  await server.close();

  if (store instanceof RedisKeyValueStore) {
    try {
      await store.close();
    } catch (error) {
      logger.warn({ error }, 'Failed to gracefully close Redis store');
    }
  }
}

/** In-memory storage for local development, Redis when the driver says so. */
function createStore(config: AppConfig): KeyValueStore {
  if (config.store.driver === 'redis') {
    if (!config.store.redisUrl) {
      throw new Error('STORE_DRIVER=redis requires REDIS_URL environment variable');
    }

    return new RedisKeyValueStore({ url: config.store.redisUrl });
  }

  return new InMemoryKeyValueStore();
}
