export type StoreKey = string;

/**
 * Minimal key-value contract shared by the session and response caches. Values
 * are opaque strings; every write carries its own expiry.
 */
export interface KeyValueStore {
  get(key: StoreKey): Promise<string | undefined>;
  set(key: StoreKey, value: string, ttlSeconds: number): Promise<void>;
  delete(key: StoreKey): Promise<void>;
  /** One slot per requested key, `undefined` where the key is absent. */
  mget(keys: readonly StoreKey[]): Promise<Array<string | undefined>>;
}

/** Optional configuration for store instances. */
export interface KeyValueStoreContext {
  prefix?: string;
}
