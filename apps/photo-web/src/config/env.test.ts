import { describe, expect, it } from 'vitest';

import { loadConfig } from './env';

const requiredEnv = {
  FLICKR_API_KEY: 'test-key',
  FLICKR_API_SECRET: 'test-secret',
};

describe('loadConfig', () => {
  it('applies defaults for optional settings', () => {
    const config = loadConfig({ ...requiredEnv, NODE_ENV: 'test' });

    expect(config).toEqual({
      env: 'test',
      port: 8000,
      flickr: {
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        callbackUrl: 'http://localhost:8000/callback',
      },
      store: { driver: 'memory', redisUrl: undefined },
      cache: { friendsTtlSeconds: 7200, photoDetailsTtlSeconds: 172800 },
      friendsPhotoStrategy: 'per-contact',
      cookie: { secure: false },
      rateLimit: { max: 120, timeWindow: '1 minute' },
      logLevel: undefined,
    });
  });

  it('reads cache lifetimes, driver and strategy overrides', () => {
    const config = loadConfig({
      ...requiredEnv,
      NODE_ENV: 'production',
      STORE_DRIVER: 'REDIS',
      REDIS_URL: 'redis://cache.internal:6379/0',
      REDIS_FRIENDS_CACHE_TTL: '600',
      REDIS_PHOTO_DETAILS_CACHE_TTL: '3600',
      FRIENDS_PHOTO_STRATEGY: 'snapshot',
      COOKIE_SECURE: 'true',
    });

    expect(config.store).toEqual({ driver: 'redis', redisUrl: 'redis://cache.internal:6379/0' });
    expect(config.cache).toEqual({ friendsTtlSeconds: 600, photoDetailsTtlSeconds: 3600 });
    expect(config.friendsPhotoStrategy).toBe('snapshot');
    expect(config.cookie.secure).toBe(true);
  });

  it('rejects a missing API key', () => {
    expect(() => loadConfig({ FLICKR_API_SECRET: 'test-secret' })).toThrow();
  });

  it('rejects a non-numeric TTL', () => {
    expect(() => loadConfig({ ...requiredEnv, REDIS_FRIENDS_CACHE_TTL: 'soon' })).toThrow(
      'Invalid REDIS_FRIENDS_CACHE_TTL value: soon',
    );
  });
});
