import type { Lookup } from '../services/cache';

export type LookupErrorCode = 'not_found' | 'upstream_unavailable';

/** A resolved value, or the reason there is none. */
export type LookupPayload<T> = T | { error: LookupErrorCode; message: string };

export function toLookupPayload<T>(lookup: Lookup<T>): LookupPayload<T> {
  switch (lookup.status) {
    case 'found':
      return lookup.value;
    case 'not_found':
      return { error: 'not_found', message: lookup.message };
    case 'unavailable':
      return { error: 'upstream_unavailable', message: lookup.error.message };
  }
}

/** One member per requested identifier, whatever happened to it. */
export function toBatchPayload<T>(results: Map<string, Lookup<T>>): Record<string, LookupPayload<T>> {
  return Object.fromEntries(
    Array.from(results, ([id, lookup]) => [id, toLookupPayload(lookup)] as const),
  );
}
