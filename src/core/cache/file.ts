import { readFile, writeFile, mkdir, rm, readdir, rename } from 'fs/promises';
import { join } from 'path';
import type { CacheEntry } from '../../types/index.js';
import { expiryFrom, type CacheStore } from './store.js';

function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'key' in value && typeof value.key === 'string' &&
    'value' in value && typeof value.value === 'string' &&
    'storedAt' in value && typeof value.storedAt === 'string' &&
    'expiresAt' in value && (value.expiresAt === null || typeof value.expiresAt === 'string')
  );
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per key under `cacheDir`. Expired entries are removed when read.
 */
export class FileCacheStore implements CacheStore {
  private cacheDir: string;
  private now: () => number;
  private writes = 0;

  constructor(cacheDir: string, now: () => number = Date.now) {
    this.cacheDir = cacheDir;
    this.now = now;
  }

  private pathFor(key: string): string {
    return join(this.cacheDir, `${encodeURIComponent(key)}.json`);
  }

  async get(key: string): Promise<string | null> {
    const path = this.pathFor(key);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isCacheEntry(parsed) || parsed.key !== key) {
      throw new Error(`Corrupt cache entry: ${path}`);
    }

    if (parsed.expiresAt !== null && Date.parse(parsed.expiresAt) <= this.now()) {
      await rm(path, { force: true });
      return null;
    }

    return parsed.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const now = this.now();
    const expiresAt = expiryFrom(now, ttlSeconds);
    const entry: CacheEntry = {
      key,
      value,
      storedAt: new Date(now).toISOString(),
      expiresAt: expiresAt === null ? null : new Date(expiresAt).toISOString(),
    };

    await mkdir(this.cacheDir, { recursive: true });

    // Write then rename so a concurrent reader never sees a half-written file
    const path = this.pathFor(key);
    const tempPath = `${path}.${process.pid}-${now}-${this.writes++}.tmp`;
    await writeFile(tempPath, JSON.stringify(entry, null, 2));
    await rename(tempPath, path);
  }

  async delete(key: string): Promise<boolean> {
    try {
      await rm(this.pathFor(key));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async clear(): Promise<void> {
    let files: string[];
    try {
      files = await readdir(this.cacheDir);
    } catch (error) {
      if (isNotFound(error)) return;
      throw error;
    }

    await Promise.all(
      files
        .filter((file) => file.endsWith('.json'))
        .map((file) => rm(join(this.cacheDir, file), { force: true }))
    );
  }
}
