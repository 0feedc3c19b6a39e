import type { CacheNamespace } from '../../types/index.js';

export interface CacheStore {
  get(key: string): Promise<string | null>;
  /** Overwrites any existing value. A missing or non-positive TTL never expires. */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
}

export function cacheKey(namespace: CacheNamespace, videoId: string): string {
  return `${namespace}:${videoId}`;
}

export function expiryFrom(now: number, ttlSeconds?: number): number | null {
  if (ttlSeconds === undefined || ttlSeconds <= 0) return null;
  return now + ttlSeconds * 1000;
}
