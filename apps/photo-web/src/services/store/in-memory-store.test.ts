import { describe, expect, it } from 'vitest';

import { InMemoryKeyValueStore } from './in-memory-store';

function createClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('InMemoryKeyValueStore', () => {
  it('returns the exact value until the TTL elapses', async () => {
    const clock = createClock();
    const store = new InMemoryKeyValueStore({ now: clock.now });
    const payload = JSON.stringify({ found: true, value: { id: '1', title: 'Pier' } });

    await store.set('photo_details:1', payload, 60);
    clock.advance(59_999);
    await expect(store.get('photo_details:1')).resolves.toBe(payload);

    clock.advance(1);
    await expect(store.get('photo_details:1')).resolves.toBeUndefined();
  });

  it('returns one slot per key from mget', async () => {
    const clock = createClock();
    const store = new InMemoryKeyValueStore({ now: clock.now });

    await store.set('a', '1', 10);
    await store.set('c', '3', 1);
    clock.advance(1_000);

    await expect(store.mget(['a', 'b', 'c'])).resolves.toEqual(['1', undefined, undefined]);
  });

  it('deletes keys and applies the namespace prefix', async () => {
    const store = new InMemoryKeyValueStore({ prefix: 'test:' });

    await store.set('session:abc', '{}', 10);
    expect(store.keys()).toEqual(['test:session:abc']);

    await store.delete('session:abc');
    await expect(store.get('session:abc')).resolves.toBeUndefined();
  });

  it('overwrites with a fresh expiry', async () => {
    const clock = createClock();
    const store = new InMemoryKeyValueStore({ now: clock.now });

    await store.set('k', 'old', 5);
    clock.advance(4_000);
    await store.set('k', 'new', 5);
    clock.advance(4_000);

    await expect(store.get('k')).resolves.toBe('new');
  });
});
