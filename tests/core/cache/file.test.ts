import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { FileCacheStore } from '../../../src/core/cache/index.js';

describe('FileCacheStore', () => {
  let cacheDir: string;

  beforeEach(async () => {
    cacheDir = await mkdtemp(join(tmpdir(), 'tube-digest-cache-'));
  });

  afterEach(async () => {
    await rm(cacheDir, { recursive: true, force: true });
  });

  it('round-trips values through one file per key', async () => {
    const store = new FileCacheStore(cacheDir);
    await store.set('summary:abc123', '{"title":"T"}');
    await store.set('transcript:abc123', 'text');

    expect(await store.get('summary:abc123')).toBe('{"title":"T"}');
    expect(await store.get('transcript:abc123')).toBe('text');
    expect((await readdir(cacheDir)).sort()).toEqual(['summary%3Aabc123.json', 'transcript%3Aabc123.json']);
  });

  it('returns null for a missing key or a missing directory', async () => {
    const store = new FileCacheStore(join(cacheDir, 'not-created'));
    expect(await store.get('summary:abc123')).toBeNull();
  });

  it('removes expired entries when they are read', async () => {
    let now = Date.parse('2024-01-01T00:00:00Z');
    const store = new FileCacheStore(cacheDir, () => now);
    await store.set('summary:abc123', 'value', 60);

    now += 59_000;
    expect(await store.get('summary:abc123')).toBe('value');

    now += 1_000;
    expect(await store.get('summary:abc123')).toBeNull();
    expect(await readdir(cacheDir)).toEqual([]);
  });

  it('throws on a corrupt entry', async () => {
    const store = new FileCacheStore(cacheDir);
    await writeFile(join(cacheDir, 'summary%3Aabc123.json'), '{"key":"summary:other","value":"x"}');

    await expect(store.get('summary:abc123')).rejects.toThrow('Corrupt cache entry');
  });

  it('deletes keys and clears the directory', async () => {
    const store = new FileCacheStore(cacheDir);
    await store.set('summary:a', '1');
    await store.set('summary:b', '2');

    expect(await store.delete('summary:a')).toBe(true);
    expect(await store.delete('summary:a')).toBe(false);

    await store.clear();
    expect(await store.get('summary:b')).toBeNull();
    expect(await readdir(cacheDir)).toEqual([]);
  });

  it('treats clearing a missing directory as a no-op', async () => {
    const store = new FileCacheStore(join(cacheDir, 'not-created'));
    await expect(store.clear()).resolves.toBeUndefined();
  });
});
