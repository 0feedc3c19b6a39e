export const CACHE_NAMESPACES = ['transcript', 'summary'] as const;

export type CacheNamespace = (typeof CACHE_NAMESPACES)[number];

export interface CacheEntry {
  key: string;
  value: string;
  storedAt: string;
  expiresAt: string | null; // null = never expires
}
