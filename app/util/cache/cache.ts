// Abstract base class for a cache of values keyed by string
export abstract class Cache<V> {
  /**
   * get a value from the cache - returning `undefined` if the key is not in the cache
   * @param key - the key string to use to get the value
   * @returns A `Promise` containing the value or `undefined` if the key can not be found
   */
  abstract get(key: string): Promise<V | undefined>;

  /**
   * get a value from the cache. if the key is not in the cache, fetch the value from somewhere else
   * and insert it into the cache before returning it
   * @param key - the key string to use to get the value
   * @returns A `Promise` containing the value
   */
  abstract fetch(key: string): Promise<V>;

  /**
   * fetch the value again and replace the cached one once the fetch succeeds
   * @param key - the key string to use to get the value
   * @returns A `Promise` containing the new value
   */
  abstract refresh(key: string): Promise<V>;

  /**
   * set a value in the cache
   * @param key - the key string to use to store the value
   * @param value - the value to store
   */
  abstract set(key: string, value: V): Promise<void>;

  abstract delete(key: string): Promise<void>;

  // drop every value, and the results of fetches still in progress
  abstract clear(): void;
}
