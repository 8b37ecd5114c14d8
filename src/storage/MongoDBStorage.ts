/**
 * MongoDB Storage
 *
 * Storage backend over the official MongoDB driver. Collections referenced by
 * the bot configuration map one-to-one to MongoDB collections of the configured
 * database.
 *
 * - Connection check (`ping`) with exponential backoff on start
 * - Credentials masked in every log line
 * - Driver failures wrapped in `StorageError` with the operation and collection
 *
 * @since 2025
 */

import { MongoClient } from 'mongodb';
import type { Collection, Db, Document, Filter, FindOptions, MongoClientOptions, UpdateFilter } from 'mongodb';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { ColumnQueryOptions, DocumentFilter, QueryOptions, StorageDocument } from '../types/index.js';
import { StorageError, getErrorMessage } from '../utils/errorHandler.js';
import { retryStorageOperation, type RetryOptions } from '../utils/retryUtils.js';
import type { MongoStorageConfig, Storage } from './Storage.js';

export interface MongoDBStorageOptions {
  clientOptions?: MongoClientOptions;
  retry?: RetryOptions;
}

/**
 * Builds a `mongodb://` connection string. Credentials are omitted when no
 * username is configured.
 */
export function buildMongoUrl(config: Omit<MongoStorageConfig, 'database'>): string {
  const credentials = config.username
    ? `${encodeURIComponent(config.username)}:${encodeURIComponent(config.password)}@`
    : '';
  return `mongodb://${credentials}${config.address}:${config.port}`;
}

/**
 * Replaces the user:password part of a connection string
 */
export function maskMongoUrl(url: string): string {
  return url.replace(/\/\/[^:@/]+(:[^@/]*)?@/, '//***:***@');
}

function toMongoFilter(filter: DocumentFilter): Filter<Document> {
  const query: Document = { ...filter };
  return query;
}

function toSetUpdate(document: StorageDocument): UpdateFilter<Document> {
  const fields: Document = { ...document };
  return { $set: fields };
}

export class MongoDBStorage implements Storage {
  private readonly url: string;
  private readonly databaseName: string;
  private readonly options: MongoDBStorageOptions;
  private client: MongoClient | null = null;
  private database: Db | null = null;

  constructor(config: MongoStorageConfig, options: MongoDBStorageOptions = {}) {
    this.url = buildMongoUrl(config);
    this.databaseName = config.database;
    this.options = options;
  }

  get isConnected(): boolean {
    return this.database !== null;
  }

  /**
   * Opens the client and checks the server with a ping
   */
  async connect(): Promise<void> {
    if (this.database) {
      return;
    }

    const client = new MongoClient(this.url, {
      connectTimeoutMS: 10000,
      serverSelectionTimeoutMS: 10000,
      ...this.options.clientOptions
    });

    const outcome = await retryStorageOperation(async () => {
      await client.connect();
      await client.db(this.databaseName).command({ ping: 1 });
    }, 'MongoDB connection', this.options.retry);

    if (!outcome.success) {
      await client.close().catch((closeError: unknown) => {
        LogEngine.warn('Failed to close MongoDB client after connection failure', {
          error: getErrorMessage(closeError)
        });
      });
      LogEngine.error('Failed to connect to MongoDB', {
        url: maskMongoUrl(this.url),
        database: this.databaseName,
        error: outcome.error?.message
      });
      throw new StorageError('Failed to connect to mongo!', {
        context: { database: this.databaseName },
        cause: outcome.error
      });
    }

    this.client = client;
    this.database = client.db(this.databaseName);
    LogEngine.info('MongoDB connection established', {
      url: maskMongoUrl(this.url),
      database: this.databaseName,
      attempts: outcome.attemptCount
    });
  }

  async disconnect(): Promise<void> {
    if (!this.client) {
      return;
    }
    try {
      await this.client.close();
      LogEngine.info('MongoDB connection closed');
    } catch (error) {
      LogEngine.error('Error closing MongoDB connection', {
        error: getErrorMessage(error)
      });
      throw new StorageError('Failed to close mongo connection', { cause: error });
    } finally {
      this.client = null;
      this.database = null;
    }
  }

  async getData(collection: string, options: QueryOptions = {}): Promise<StorageDocument[]> {
    const { columns = [], filter = {}, count = 0 } = options;
    return this.run('getData', collection, async target => {
      const findOptions: FindOptions = {};
      if (columns.length > 0) {
        const projection: Document = { _id: columns.includes('_id') ? 1 : 0 };
        for (const column of columns) {
          projection[column] = 1;
        }
        findOptions.projection = projection;
      }

      const cursor = target.find(toMongoFilter(filter), findOptions);
      if (count > 0) {
        cursor.limit(count);
      }
      const documents = await cursor.toArray();
      return documents.map((document): StorageDocument => ({ ...document }));
    });
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
    await this.run('insertOne', collection, target => target.insertOne({ ...document }));
  }

  async insertMany(collection: string, documents: StorageDocument[]): Promise<void> {
    if (documents.length === 0) {
      return;
    }
    await this.run('insertMany', collection, target =>
      target.insertMany(documents.map(document => ({ ...document }))));
  }

  async insertIfAbsent(collection: string, idColumn: string, id: unknown, document: StorageDocument): Promise<boolean> {
    const fields: Document = { ...document, [idColumn]: id };
    const result = await this.run('insertIfAbsent', collection, target =>
      target.updateOne(toMongoFilter({ [idColumn]: id }), { $setOnInsert: fields }, { upsert: true }));
    return result.upsertedCount > 0;
  }

  async removeOneByColumn(collection: string, column: string, value: unknown): Promise<number> {
    return this.removeOneByFilter(collection, { [column]: value });
  }

  async removeOneByFilter(collection: string, filter: DocumentFilter): Promise<number> {
    const result = await this.run('removeOne', collection, target => target.deleteOne(toMongoFilter(filter)));
    return result.deletedCount;
  }

  async removeManyByColumn(collection: string, column: string, value: unknown): Promise<number> {
    return this.removeManyByFilter(collection, { [column]: value });
  }

  async removeManyByFilter(collection: string, filter: DocumentFilter): Promise<number> {
    const result = await this.run('removeMany', collection, target => target.deleteMany(toMongoFilter(filter)));
    return result.deletedCount;
  }

  async updateOne(collection: string, idColumn: string, id: unknown, document: StorageDocument): Promise<void> {
    const update = toSetUpdate(document);
    await this.run('updateOne', collection, target =>
      target.updateOne(toMongoFilter({ [idColumn]: id }), update, { upsert: true }));
  }

  async updateMany(collection: string, idColumn: string, id: unknown, document: StorageDocument): Promise<void> {
    const update = toSetUpdate(document);
    await this.run('updateMany', collection, target =>
      target.updateMany(toMongoFilter({ [idColumn]: id }), update, { upsert: true }));
  }

  private async run<T>(
    operation: string,
    collection: string,
    task: (target: Collection<Document>) => Promise<T>
  ): Promise<T> {
    if (!this.database) {
      throw new StorageError('MongoDB storage is not connected', {
        context: { operation, collection }
      });
    }

    const start = Date.now();
    try {
      const result = await task(this.database.collection(collection));
      LogEngine.debug('MongoDB operation executed', {
        operation,
        collection,
        duration: `${Date.now() - start}ms`
      });
      return result;
    } catch (error) {
      LogEngine.error('MongoDB operation error', {
        operation,
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
