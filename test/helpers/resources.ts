import * as fs from 'fs';
import * as path from 'path';
import type { Collection, Instance } from '../../app/models/collection';
import { parseCapabilities, parseInstances } from '../../app/models/collection';

/**
 * Reads a file from the test resources directory
 *
 * @param name - the file name, e.g. `collections.json`
 * @returns the file contents
 */
export function readResource(name: string): string {
  return fs.readFileSync(path.join(__dirname, '..', 'resources', name), 'utf8');
}

/**
 * Returns a parsed collection from `collections.json`
 *
 * @param id - the collection id, `metar` or `forecast`
 */
export function loadCollection(id: string): Collection {
  const collection = parseCapabilities(readResource('collections.json')).find((c) => c.id === id);
  if (!collection) throw new Error(`Test collection ${id} is missing`);
  return collection;
}

/**
 * Returns a parsed instance of the forecast collection from `instances.json`
 */
export function loadInstance(id: string): Instance {
  const instance = parseInstances(readResource('instances.json')).find((i) => i.id === id);
  if (!instance) throw new Error(`Test instance ${id} is missing`);
  return instance;
}
