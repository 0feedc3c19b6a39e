import type { Logger } from '../logger.js';
import type { CacheStore } from './store.js';

/**
 * Fail-open wrapper: a store that is down behaves like an empty cache
 * that drops writes, and never fails the caller.
 */
export class ResilientCache implements CacheStore {
  private store: CacheStore;
  private logger?: Logger;

  constructor(store: CacheStore, logger?: Logger) {
    this.store = store;
    this.logger = logger;
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.store.get(key);
    } catch (error) {
      this.logger?.warn?.(`Cache read failed for ${key}, treating as miss: ${this.describe(error)}`);
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    try {
      await this.store.set(key, value, ttlSeconds);
    } catch (error) {
      this.logger?.warn?.(`Cache write failed for ${key}: ${this.describe(error)}`);
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      return await this.store.delete(key);
    } catch (error) {
      this.logger?.warn?.(`Cache delete failed for ${key}: ${this.describe(error)}`);
      return false;
    }
  }

  async clear(): Promise<void> {
    try {
      await this.store.clear();
    } catch (error) {
      this.logger?.warn?.(`Cache clear failed: ${this.describe(error)}`);
    }
  }
}
