import type { Redis } from 'ioredis';
import { describe, expect, it, vi } from 'vitest';

import { StoreUnavailableError } from '../../errors';

import { RedisKeyValueStore } from './redis-store';

function createRedisStub() {
  return {
    get: vi.fn().mockResolvedValue(null),
    set: vi.fn().mockResolvedValue('OK'),
    del: vi.fn().mockResolvedValue(1),
    mget: vi.fn().mockResolvedValue([]),
    quit: vi.fn().mockResolvedValue('OK'),
  };
}

describe('RedisKeyValueStore', () => {
  it('writes values with an EX expiry under the prefix', async () => {
    const redis = createRedisStub();
    const store = new RedisKeyValueStore({ client: redis as unknown as Redis, prefix: 'photos:' });

    await store.set('session:abc', '{"accessToken":"t"}', 86400);

    expect(redis.set).toHaveBeenCalledWith('photos:session:abc', '{"accessToken":"t"}', 'EX', 86400);
  });

  it('maps null replies to undefined', async () => {
    const redis = createRedisStub();
    redis.mget.mockResolvedValue(['{"found":true,"value":1}', null]);
    const store = new RedisKeyValueStore({ client: redis as unknown as Redis });

    await expect(store.get('missing')).resolves.toBeUndefined();
    await expect(store.mget(['a', 'b'])).resolves.toEqual(['{"found":true,"value":1}', undefined]);
    expect(redis.mget).toHaveBeenCalledWith(['a', 'b']);
  });

  it('skips MGET for an empty key list', async () => {
    const redis = createRedisStub();
    const store = new RedisKeyValueStore({ client: redis as unknown as Redis });

    await expect(store.mget([])).resolves.toEqual([]);
    expect(redis.mget).not.toHaveBeenCalled();
  });

  it('wraps command failures as StoreUnavailableError', async () => {
    const redis = createRedisStub();
    redis.get.mockRejectedValue(new Error('ECONNREFUSED'));
    const store = new RedisKeyValueStore({ client: redis as unknown as Redis });

    await expect(store.get('session:abc')).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('does not close clients it does not own', async () => {
    const redis = createRedisStub();
    const store = new RedisKeyValueStore({ client: redis as unknown as Redis });

    await store.close();

    expect(redis.quit).not.toHaveBeenCalled();
  });

  it('requires a client or url', () => {
    expect(() => new RedisKeyValueStore()).toThrow('RedisKeyValueStore requires either a client or a url.');
  });
});
