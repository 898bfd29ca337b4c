import type { KeyValueStore, KeyValueStoreContext, StoreKey } from './store';

/** Representation of a stored value with expiry metadata. */
interface MemoryEntry {
  value: string;
  expiresAt: number;
}

export interface InMemoryKeyValueStoreOptions extends KeyValueStoreContext {
  now?: () => number;
}

/** Simple Map-based store used for local development and tests. */
export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly store = new Map<StoreKey, MemoryEntry>();
  private readonly prefix: string;
  private readonly now: () => number;

  constructor(options: InMemoryKeyValueStoreOptions = {}) {
    this.prefix = options.prefix ?? '';
    this.now = options.now ?? Date.now;
  }

  async get(key: StoreKey): Promise<string | undefined> {
    return this.readEntry(this.namespaced(key));
  }

  async set(key: StoreKey, value: string, ttlSeconds: number): Promise<void> {
    this.store.set(this.namespaced(key), {
      value,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async delete(key: StoreKey): Promise<void> {
    this.store.delete(this.namespaced(key));
  }

  async mget(keys: readonly StoreKey[]): Promise<Array<string | undefined>> {
    return keys.map((key) => this.readEntry(this.namespaced(key)));
  }

  /** Keys currently held, expired or not. Intended for tests. */
  keys(): StoreKey[] {
    return Array.from(this.store.keys());
  }

  private readEntry(namespacedKey: StoreKey): string | undefined {
    const entry = this.store.get(namespacedKey);

    if (!entry) {
      return undefined;
    }

    if (this.now() >= entry.expiresAt) {
      this.store.delete(namespacedKey);
      return undefined;
    }

    return entry.value;
  }

  private namespaced(key: StoreKey): StoreKey {
    return `${this.prefix}${key}`;
  }
}
