import EdrClient from '../../client/edr-client';
import type { Collection, Instance } from '../../models/collection';
import logger from '../log';
import { deepFreeze } from '../object';
import { MemoryCache, type MemoryCacheOptions } from './memory-cache';

// Everything the query builder needs to know about one EDR server
export interface ServerSchema {
  serverUrl: string;
  collections: readonly Collection[];
  // instances of the collections that have any, by collection id
  instances: Readonly<Record<string, readonly Instance[]>>;
  fetchedAt: string;
}

/**
 * Reads the collections of a server, and the instances of those that have them
 *
 * @param client - the client of the server
 * @returns the immutable server schema
 */
export async function fetchServerSchema(client: EdrClient): Promise<ServerSchema> {
  const collections = await client.collections();
  const withInstances = collections.filter((c) => c.hasInstances);
  const instanceLists = await Promise.all(withInstances.map((c) => client.instances(c.id)));
  const instances: Record<string, readonly Instance[]> = {};
  withInstances.forEach((c, i) => { instances[c.id] = instanceLists[i]; });
  logger.info(`Read ${collections.length} collections`, { component: 'schema-cache', serverUrl: client.serverUrl });
  return deepFreeze({
    serverUrl: client.serverUrl, collections, instances, fetchedAt: new Date().toISOString(),
  });
}

export type SchemaCache = MemoryCache<ServerSchema>;

/**
 * Creates the cache of server schemas, keyed by server URL. Concurrent fetches for a server
 * share one request and a failed refresh keeps the previous schema.
 *
 * @param clientFor - returns the client of a server
 * @param options - cache size and TTL, taken from the environment by default
 * @returns the cache
 */
export function createSchemaCache(
  clientFor: (serverUrl: string) => EdrClient = (serverUrl): EdrClient => new EdrClient(serverUrl),
  options?: MemoryCacheOptions,
): SchemaCache {
  return new MemoryCache<ServerSchema>((serverUrl) => fetchServerSchema(clientFor(serverUrl)), options);
}
