import { LogEngine } from '@wgtechlabs/log-engine';
import type { ColumnQueryOptions, DocumentFilter, QueryOptions, StorageDocument } from '../types/index.js';
import { StorageError, getErrorMessage } from '../utils/errorHandler.js';
import { ConditionalLogger } from '../utils/logConfig.js';
import { applyQuery, matchesFilter } from './documentQuery.js';
import type { Storage } from './Storage.js';

/**
 * Storage over whole-collection reads and writes.
 *
 * Subclasses only load and save the document list of a collection; querying,
 * upserts and removals run in process. Mutations of one collection are queued
 * so a read-modify-write never interleaves with another.
 */
export abstract class DocumentListStorage implements Storage {
  private readonly collectionQueues = new Map<string, Promise<void>>();

  protected abstract readCollection(collection: string): Promise<StorageDocument[]>;

  protected abstract writeCollection(collection: string, documents: StorageDocument[]): Promise<void>;

  abstract connect(): Promise<void>;

  abstract disconnect(): Promise<void>;

  async getData(collection: string, options: QueryOptions = {}): Promise<StorageDocument[]> {
    const documents = await this.guard('getData', collection, () => this.readCollection(collection));
    return applyQuery(documents, options);
  }

  async getDataByColumn(
    collection: string,
    by: string,
    value: unknown,
    options: ColumnQueryOptions = {}
  ): Promise<StorageDocument[]> {
    return this.getData(collection, { ...options, filter: { [by]: value } });
  }

  async insertOne(collection: string, document: StorageDocument): Promise<void> {
    await this.insertMany(collection, [document]);
  }

  async insertMany(collection: string, documents: StorageDocument[]): Promise<void> {
    await this.mutate('insert', collection, current => {
      current.push(...documents.map(document => ({ ...document })));
      return true;
    });
  }

  async insertIfAbsent(collection: string, idColumn: string, id: unknown, document: StorageDocument): Promise<boolean> {
    let inserted = false;
    await this.mutate('insertIfAbsent', collection, current => {
      if (current.some(existing => matchesFilter(existing, { [idColumn]: id }))) {
        return false;
      }
      current.push({ ...document, [idColumn]: id });
      inserted = true;
      return true;
    });
    return inserted;
  }

  async removeOneByColumn(collection: string, column: string, value: unknown): Promise<number> {
    return this.removeOneByFilter(collection, { [column]: value });
  }

  async removeOneByFilter(collection: string, filter: DocumentFilter): Promise<number> {
    let removed = 0;
    await this.mutate('removeOne', collection, current => {
      const index = current.findIndex(document => matchesFilter(document, filter));
      if (index === -1) {
        return false;
      }
      current.splice(index, 1);
      removed = 1;
      return true;
    });
    return removed;
  }

  async removeManyByColumn(collection: string, column: string, value: unknown): Promise<number> {
    return this.removeManyByFilter(collection, { [column]: value });
  }

  async removeManyByFilter(collection: string, filter: DocumentFilter): Promise<number> {
    let removed = 0;
    await this.mutate('removeMany', collection, current => {
      const kept = current.filter(document => !matchesFilter(document, filter));
      removed = current.length - kept.length;
      current.splice(0, current.length, ...kept);
      return removed > 0;
    });
    return removed;
  }

  async updateOne(collection: string, idColumn: string, id: unknown, document: StorageDocument): Promise<void> {
    await this.update('updateOne', collection, idColumn, id, document, false);
  }

  async updateMany(collection: string, idColumn: string, id: unknown, document: StorageDocument): Promise<void> {
    await this.update('updateMany', collection, idColumn, id, document, true);
  }

  private async update(
    operation: string,
    collection: string,
    idColumn: string,
    id: unknown,
    document: StorageDocument,
    many: boolean
  ): Promise<void> {
    await this.mutate(operation, collection, current => {
      let matched = 0;
      for (let index = 0; index < current.length; index++) {
        if (!matchesFilter(current[index], { [idColumn]: id })) {
          continue;
        }
        current[index] = { ...current[index], ...document };
        matched++;
        if (!many) {
          break;
        }
      }
      if (matched === 0) {
        current.push({ [idColumn]: id, ...document });
      }
      return true;
    });
  }

  /**
   * Runs a read-modify-write on one collection. The change callback edits the
   * list in place and returns whether anything needs writing back.
   */
  private async mutate(
    operation: string,
    collection: string,
    change: (documents: StorageDocument[]) => boolean
  ): Promise<void> {
    await this.enqueue(collection, () => this.guard(operation, collection, async () => {
      const documents = await this.readCollection(collection);
      if (change(documents)) {
        await this.writeCollection(collection, documents);
        ConditionalLogger.logStorage(operation, { collection, documents: documents.length });
      }
    }));
  }

  private async enqueue<T>(collection: string, task: () => Promise<T>): Promise<T> {
    const previous = this.collectionQueues.get(collection) ?? Promise.resolve();
    const run = previous.then(task);
    this.collectionQueues.set(collection, run.then(() => undefined, () => undefined));
    return run;
  }

  private async guard<T>(operation: string, collection: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      LogEngine.error(`Storage ${operation} failed`, {
        collection,
        error: getErrorMessage(error)
      });
      throw new StorageError(`Failed to ${operation} in collection ${collection}`, {
        context: { operation, collection },
        cause: error
      });
    }
  }
}
