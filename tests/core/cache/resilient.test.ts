import { describe, it, expect, vi } from 'vitest';
import { MemoryCacheStore, ResilientCache, type CacheStore } from '../../../src/core/cache/index.js';

const brokenStore: CacheStore = {
  get: async () => {
    throw new Error('connection refused');
  },
  set: async () => {
    throw new Error('connection refused');
  },
  delete: async () => {
    throw new Error('connection refused');
  },
  clear: async () => {
    throw new Error('connection refused');
  },
};

describe('ResilientCache', () => {
  it('passes through to a healthy store', async () => {
    const cache = new ResilientCache(new MemoryCacheStore());
    await cache.set('summary:abc123', 'value');

    expect(await cache.get('summary:abc123')).toBe('value');
    expect(await cache.delete('summary:abc123')).toBe(true);
  });

  it('turns read failures into misses with a warning', async () => {
    const warn = vi.fn();
    const cache = new ResilientCache(brokenStore, { warn });

    expect(await cache.get('summary:abc123')).toBeNull();
    expect(warn).toHaveBeenCalledWith('Cache read failed for summary:abc123, treating as miss: connection refused');
  });

  it('drops failed writes, deletes and clears with a warning', async () => {
    const warn = vi.fn();
    const cache = new ResilientCache(brokenStore, { warn });

    await expect(cache.set('summary:abc123', 'value', 60)).resolves.toBeUndefined();
    expect(await cache.delete('summary:abc123')).toBe(false);
    await expect(cache.clear()).resolves.toBeUndefined();

    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenNthCalledWith(1, 'Cache write failed for summary:abc123: connection refused');
  });
});
