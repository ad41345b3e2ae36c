import { LRUCache } from 'lru-cache';
import { Cache } from './cache';
import env from '../env';

// Implementation of a cache backed by an in-memory least-recently-used (LRU) cache

type FetchMethod<V> = (key: string) => Promise<V>;

export interface MemoryCacheOptions {
  ttl?: number; // Optional TTL in milliseconds, 0 for no expiration
  max?: number; // Optional max number of entries override
}

export class MemoryCache<V extends object> extends Cache<V> {
  private data: LRUCache<string, V>;

  private fetchMethod: FetchMethod<V>;

  private pending: Map<string, Promise<V>> = new Map();

  // incremented by clear() so that fetches started before it do not fill the cache
  private generation = 0;

  constructor(fetchMethod: FetchMethod<V>, options?: MemoryCacheOptions) {
    super();
    this.fetchMethod = fetchMethod;

    const ttl = options?.ttl ?? env.schemaCacheTtlMs;
    this.data = new LRUCache<string, V>({
      max: options?.max ?? env.schemaCacheMaxEntries,
      ttl: ttl > 0 ? ttl : undefined, // No expiration if undefined
    });
  }

  async get(key: string): Promise<V | undefined> {
    return this.data.get(key);
  }

  private load(key: string): Promise<V> {
    // Check for in-progress fetch
    const existingPromise = this.pending.get(key);
    if (existingPromise) return existingPromise;

    const { generation } = this;
    const fetchPromise = this.fetchMethod(key)
      .then((result) => {
        if (generation === this.generation) {
          this.data.set(key, result);
          this.pending.delete(key);
        }
        return result;
      })
      .catch((err) => {
        // the cached value, if any, is left as it was
        if (generation === this.generation) this.pending.delete(key);
        throw err;
      });

    this.pending.set(key, fetchPromise);
    return fetchPromise;
  }

  async fetch(key: string): Promise<V> {
    const cached = this.data.get(key);
    if (cached !== undefined) return cached;
    return this.load(key);
  }

  async refresh(key: string): Promise<V> {
    return this.load(key);
  }

  async set(key: string, value: V): Promise<void> {
    this.data.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  clear(): void {
    this.generation += 1;
    this.pending.clear();
    this.data.clear();
  }
}
