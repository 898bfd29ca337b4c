export type { KeyValueStore, StoreKey } from './store';
export { InMemoryKeyValueStore, type InMemoryKeyValueStoreOptions } from './in-memory-store';
export { RedisKeyValueStore, type RedisKeyValueStoreOptions } from './redis-store';
