import { describe, expect, it } from 'vitest';
import { TtlCache } from '../src/cache/ttl-cache.js';
import { ManualClock } from './helpers.js';

describe('TtlCache', () => {
  it('serves an entry until its TTL has elapsed', () => {
    const clock = new ManualClock();
    const cache = new TtlCache<string, number>({ ttlMs: 1000, now: clock.now });

    cache.set('a', 1);
    clock.advance(999);
    expect(cache.get('a')).toBe(1);

    clock.advance(1);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('keeps expired entries for stale reads until the stale window ends', () => {
    const clock = new ManualClock();
    const cache = new TtlCache<string, string>({ ttlMs: 100, staleTtlMs: 500, now: clock.now });

    cache.set('k', 'v');
    clock.advance(200);
    expect(cache.get('k')).toBeUndefined();
    expect(cache.getStale('k')).toBe('v');

    clock.advance(300);
    expect(cache.getStale('k')).toBeUndefined();
  });

  it('never uses a stale window shorter than the TTL', () => {
    const clock = new ManualClock();
    const cache = new TtlCache<string, string>({ ttlMs: 100, staleTtlMs: 10, now: clock.now });

    cache.set('k', 'v');
    clock.advance(50);
    expect(cache.get('k')).toBe('v');
  });

  it('overwrites, deletes and clears', () => {
    const cache = new TtlCache<string, number>({ ttlMs: 1000 });

    cache.set('a', 1);
    cache.set('a', 2);
    cache.set('b', 3);
    expect(cache.get('a')).toBe(2);
    expect(cache.delete('b')).toBe(true);
    expect(cache.delete('b')).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
