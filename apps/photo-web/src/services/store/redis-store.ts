import Redis, { Redis as RedisClient } from 'ioredis';

import { StoreUnavailableError } from '../../errors';

import type { KeyValueStore, KeyValueStoreContext, StoreKey } from './store';

/** Options used to configure the Redis-backed store. */
export interface RedisKeyValueStoreOptions extends KeyValueStoreContext {
  url?: string;
  client?: RedisClient;
}

/**
 * Store implementation backed by Redis. Every command failure surfaces as a
 * {@link StoreUnavailableError}.
 */
export class RedisKeyValueStore implements KeyValueStore {
  private readonly redis: RedisClient;
  private readonly prefix: string;
  private readonly ownsClient: boolean;

  constructor(options: RedisKeyValueStoreOptions = {}) {
    if (options.client) {
      this.redis = options.client;
      this.ownsClient = false;
    } else if (options.url) {
      const redisUrl = new URL(options.url);
      if (!redisUrl.searchParams.has('family')) {
        redisUrl.searchParams.set('family', '0');
      }

      this.redis = new Redis(redisUrl.toString(), { lazyConnect: true, maxRetriesPerRequest: 2 });
      this.ownsClient = true;
    } else {
      throw new Error('RedisKeyValueStore requires either a client or a url.');
    }

    this.prefix = options.prefix ?? '';
  }

  async get(key: StoreKey): Promise<string | undefined> {
    const value = await this.run('GET', () => this.redis.get(this.namespaced(key)));
    return value ?? undefined;
  }

  async set(key: StoreKey, value: string, ttlSeconds: number): Promise<void> {
    await this.run('SET', () => this.redis.set(this.namespaced(key), value, 'EX', ttlSeconds));
  }

  async delete(key: StoreKey): Promise<void> {
    await this.run('DEL', () => this.redis.del(this.namespaced(key)));
  }

  async mget(keys: readonly StoreKey[]): Promise<Array<string | undefined>> {
    if (keys.length === 0) {
      return [];
    }

    const values = await this.run('MGET', () => this.redis.mget(keys.map((key) => this.namespaced(key))));
    return values.map((value) => value ?? undefined);
  }

  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.redis.quit();
    }
  }

  private async run<T>(command: string, operation: () => Promise<T>): Promise<T> {
    try {
      await this.ensureConnected();
      return await operation();
    } catch (error) {
      throw new StoreUnavailableError(`Redis ${command} failed`, error);
    }
  }

  private namespaced(key: StoreKey): StoreKey {
    return `${this.prefix}${key}`;
  }

  private async ensureConnected(): Promise<void> {
    if (!this.ownsClient) {
      return;
    }

    if (this.redis.status === 'ready' || this.redis.status === 'connecting') {
      return;
    }

    await this.redis.connect();
  }
}
