import type { Logger } from 'winston';
import { SavedQueryError } from '../util/errors';
import defaultLogger from '../util/log';
import type { QueryDescriptor } from './query-descriptor';
import type { SavedQueryRecord } from './saved-query';
import {
  createSavedQuery, deserialize, rename, serialize,
} from './saved-query';

/**
 * Storage of opaque saved query blobs, keyed by record id. Provided by the host application.
 */
export interface RecordStore {
  get(id: string): Promise<string | undefined>;
  put(id: string, blob: string): Promise<void>;
  delete(id: string): Promise<void>;
  // ids of every stored record
  list(): Promise<string[]>;
}

/**
 * Saved queries of every server known to the host, kept in a record store. Names are unique
 * per server.
 */
export default class SavedQueryCatalog {
  store: RecordStore;

  logger: Logger;

  constructor(store: RecordStore, logger: Logger = defaultLogger) {
    this.store = store;
    this.logger = logger.child({ component: 'saved-query-catalog' });
  }

  /**
   * Returns every readable record, oldest first. Blobs that cannot be read are logged and
   * left out so that one bad record does not hide the others.
   *
   * @param serverUrl - only return the records of this server
   * @returns the records
   */
  async list(serverUrl?: string): Promise<SavedQueryRecord[]> {
    const records: SavedQueryRecord[] = [];
    for (const id of await this.store.list()) {
      const blob = await this.store.get(id);
      if (blob === undefined) continue;
      try {
        const record = deserialize(blob);
        if (serverUrl === undefined || record.serverUrl === serverUrl) records.push(record);
      } catch (e) {
        if (!(e instanceof SavedQueryError)) throw e;
        this.logger.error(`Skipping saved query ${id}: ${e.message}`);
      }
    }
    return records.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  /**
   * @returns the record with the given id
   * @throws SavedQueryError - if there is no such record or it cannot be read
   */
  async get(id: string): Promise<SavedQueryRecord> {
    const blob = await this.store.get(id);
    if (blob === undefined) {
      throw new SavedQueryError(`There is no saved query with id ${id}`);
    }
    return deserialize(blob);
  }

  private async assertNameAvailable(serverUrl: string, name: string, exceptId?: string): Promise<void> {
    const taken = (await this.list(serverUrl)).some((r) => r.name === name && r.id !== exceptId);
    if (taken) {
      throw new SavedQueryError(`A saved query named '${name}' already exists for ${serverUrl}`);
    }
  }

  /**
   * Saves a descriptor under a new record
   *
   * @param serverUrl - the server the descriptor targets
   * @param descriptor - the descriptor
   * @param name - the name, by default the collection id and the time of creation
   * @returns the saved record
   * @throws SavedQueryError - if the name is already used for the server
   */
  async save(serverUrl: string, descriptor: QueryDescriptor, name?: string): Promise<SavedQueryRecord> {
    const record = createSavedQuery(serverUrl, descriptor, name);
    await this.assertNameAvailable(serverUrl, record.name);
    await this.store.put(record.id, serialize(record));
    this.logger.info(`Saved query ${record.name} for collection ${record.collectionId}`, { serverUrl });
    return record;
  }

  /**
   * Renames a record
   *
   * @returns the renamed record
   * @throws SavedQueryError - if the name is empty or already used for the record's server
   */
  async rename(id: string, name: string): Promise<SavedQueryRecord> {
    const renamed = rename(await this.get(id), name);
    await this.assertNameAvailable(renamed.serverUrl, renamed.name, id);
    await this.store.put(id, serialize(renamed));
    return renamed;
  }

  async delete(id: string): Promise<void> {
    await this.store.delete(id);
  }

  /**
   * Deletes every record of a server
   *
   * @returns the number of deleted records
   */
  async deleteAll(serverUrl: string): Promise<number> {
    const records = await this.list(serverUrl);
    for (const record of records) {
      await this.store.delete(record.id);
    }
    this.logger.info(`Deleted ${records.length} saved queries`, { serverUrl });
    return records.length;
  }
}
