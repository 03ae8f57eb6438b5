import { describe, it, expect, afterEach, vi } from 'vitest';
import { TTLCache } from '../ttl-cache.js';

describe('TTLCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns values until they expire', () => {
    vi.useFakeTimers();
    const cache = new TTLCache<string, number>(1000);

    cache.set('a', 1);
    cache.set('b', 2, 5000);
    expect(cache.get('a')).toBe(1);

    vi.advanceTimersByTime(1000);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBe(2);
    expect(cache.size).toBe(1);

    cache.destroy();
  });

  it('leaves expired entries out of its size', () => {
    vi.useFakeTimers();
    const cache = new TTLCache<string, string>(100, 50);

    cache.set('run', 'done');
    vi.advanceTimersByTime(150);

    expect(cache.size).toBe(0);
    cache.destroy();
  });

  it('forgets everything once destroyed', () => {
    const cache = new TTLCache<string, string>();

    cache.set('run', 'done');
    cache.destroy();

    expect(cache.get('run')).toBeUndefined();
  });
});
