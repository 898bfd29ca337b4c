import { UpstreamUnavailableError } from '../../errors';
import type { AppLogger } from '../../telemetry/logger';
import type { AppMetrics } from '../../telemetry/metrics';
import type { KeyValueStore } from '../store';

import { cacheKey, type CachePolicy } from './policies';
import { cacheEnvelopeSchema } from './schemas';

export type CachedEntry<T> = { found: true; value: T } | { found: false; error: string };

/** Outcome of a cache-or-fetch for one identifier. */
export type Lookup<T> =
  | { status: 'found'; value: T }
  | { status: 'not_found'; message: string }
  | { status: 'unavailable'; error: UpstreamUnavailableError };

/**
 * Loads one entity from Flickr. Resolve `null` for "confirmed absent"; reject
 * with {@link UpstreamUnavailableError} when Flickr could not be asked.
 */
export type Fetcher<T> = (id: string) => Promise<T | null>;

/**
 * Read-through cache over the shared key-value store. Entries are written
 * once per fetch and only ever expire; a hit never refreshes the TTL.
 */
export class ResponseCache {
  constructor(
    private readonly store: KeyValueStore,
    private readonly metrics: AppMetrics,
    private readonly logger: AppLogger,
  ) {}

  async read<T>(policy: CachePolicy<T>, id: string, scope?: string): Promise<CachedEntry<T> | undefined> {
    const raw = await this.store.get(cacheKey(policy, id, scope));
    return this.decode(policy, id, raw);
  }

  async write<T>(policy: CachePolicy<T>, id: string, entry: CachedEntry<T>, scope?: string): Promise<void> {
    const ttl = entry.found ? policy.ttlSeconds : policy.negativeTtlSeconds;
    await this.store.set(cacheKey(policy, id, scope), JSON.stringify(entry), ttl);
  }

  /**
   * `scope` narrows the entry to one viewer; fetches signed with a user's
   * credentials must pass it so their results are never served to others.
   */
  async getOrFetch<T>(policy: CachePolicy<T>, id: string, fetcher: Fetcher<T>, scope?: string): Promise<Lookup<T>> {
    const cached = await this.read(policy, id, scope);
    this.recordLookup(policy, cached ? 'hit' : 'miss');

    if (cached) {
      return toLookup(cached);
    }

    return this.fetchAndStore(policy, id, fetcher, scope);
  }

  /**
   * Resolve many identifiers at once: a single MGET, then one concurrent
   * fetch per miss. Waits for every fetch to settle before returning so a
   * failing identifier never cuts the others short. The result holds exactly
   * one entry per distinct input identifier, in input order.
   */
  async getOrFetchMany<T>(
    policy: CachePolicy<T>,
    ids: readonly string[],
    fetcher: Fetcher<T>,
    scope?: string,
  ): Promise<Map<string, Lookup<T>>> {
    const unique = Array.from(new Set(ids));
    const resolved = new Map<string, Lookup<T>>();

    if (unique.length === 0) {
      return resolved;
    }

    const raw = await this.store.mget(unique.map((id) => cacheKey(policy, id, scope)));
    const misses: string[] = [];

    unique.forEach((id, index) => {
      const cached = this.decode(policy, id, raw[index]);
      if (cached) {
        resolved.set(id, toLookup(cached));
      } else {
        misses.push(id);
      }
    });

    this.recordLookup(policy, 'hit', unique.length - misses.length);
    this.recordLookup(policy, 'miss', misses.length);

    const settled = await Promise.allSettled(
      misses.map(async (id) => [id, await this.fetchAndStore(policy, id, fetcher, scope)] as const),
    );

    const failures: unknown[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        const [id, lookup] = outcome.value;
        resolved.set(id, lookup);
      } else {
        failures.push(outcome.reason);
      }
    }

    if (failures.length > 0) {
      throw failures[0];
    }

    const ordered = new Map<string, Lookup<T>>();
    for (const id of unique) {
      const lookup = resolved.get(id);
      if (lookup) {
        ordered.set(id, lookup);
      }
    }

    return ordered;
  }

  private async fetchAndStore<T>(
    policy: CachePolicy<T>,
    id: string,
    fetcher: Fetcher<T>,
    scope?: string,
  ): Promise<Lookup<T>> {
    let value: T | null;
    try {
      value = await fetcher(id);
    } catch (error) {
      if (error instanceof UpstreamUnavailableError) {
        this.logger.warn({ policy: policy.name, id, error }, 'Flickr unavailable; skipping cache write');
        return { status: 'unavailable', error };
      }
      throw error;
    }

    if (value === null) {
      await this.write(policy, id, { found: false, error: policy.notFoundMessage }, scope);
      return { status: 'not_found', message: policy.notFoundMessage };
    }

    await this.write(policy, id, { found: true, value }, scope);
    return { status: 'found', value };
  }

  private decode<T>(policy: CachePolicy<T>, id: string, raw: string | undefined): CachedEntry<T> | undefined {
    if (raw === undefined) {
      return undefined;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ policy: policy.name, id, error }, 'Ignoring unparsable cache entry');
      return undefined;
    }

    const envelope = cacheEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      this.logger.warn({ policy: policy.name, id }, 'Ignoring malformed cache entry');
      return undefined;
    }

    if (!envelope.data.found) {
      return { found: false, error: envelope.data.error };
    }

    const value = policy.schema.safeParse(envelope.data.value);
    if (!value.success) {
      this.logger.warn({ policy: policy.name, id, issues: value.error.issues }, 'Ignoring stale cache entry');
      return undefined;
    }

    return { found: true, value: value.data };
  }

  private recordLookup<T>(policy: CachePolicy<T>, result: 'hit' | 'miss', count = 1): void {
    if (count > 0) {
      this.metrics.cacheLookups.inc({ policy: policy.name, result }, count);
    }
  }
}

function toLookup<T>(entry: CachedEntry<T>): Lookup<T> {
  return entry.found ? { status: 'found', value: entry.value } : { status: 'not_found', message: entry.error };
}
