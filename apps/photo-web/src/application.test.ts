import { describe, expect, it } from 'vitest';

import { createApplication } from './application';

const BASE_ENV: NodeJS.ProcessEnv = {
  NODE_ENV: 'test',
  FLICKR_API_KEY: 'test-key',
  FLICKR_API_SECRET: 'test-secret',
  LOG_LEVEL: 'silent',
};

describe('createApplication', () => {
  it('wires an in-memory application that answers health checks', async () => {
    const app = await createApplication({ ...BASE_ENV, FRIENDS_PHOTO_STRATEGY: 'snapshot' });

    try {
      const response = await app.server.inject({ method: 'GET', url: '/healthz' });

      expect(app.config.store.driver).toBe('memory');
      expect(app.config.friendsPhotoStrategy).toBe('snapshot');
      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
    } finally {
      await app.stop();
    }
  });

  it('refuses the redis driver without a connection URL', async () => {
    await expect(createApplication({ ...BASE_ENV, STORE_DRIVER: 'redis' })).rejects.toThrow(
      'STORE_DRIVER=redis requires REDIS_URL environment variable',
    );
  });
});
