import type { ColumnQueryOptions, DocumentFilter, QueryOptions, StorageDocument } from '../types/index.js';

/**
 * Collection-oriented storage used by every stateful component.
 *
 * Collections are addressed by name. Updates upsert: when no document has the
 * given id, a new one `{ [idColumn]: id, ...doc }` is inserted.
 */
export interface Storage {
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  getData(collection: string, options?: QueryOptions): Promise<StorageDocument[]>;
  getDataByColumn(collection: string, by: string, value: unknown, options?: ColumnQueryOptions): Promise<StorageDocument[]>;

  insertOne(collection: string, document: StorageDocument): Promise<void>;
  insertMany(collection: string, documents: StorageDocument[]): Promise<void>;
  /**
   * Inserts `{ ...document, [idColumn]: id }` unless a document with that id
   * exists; check and insert happen as one step. Resolves to whether it inserted.
   */
  insertIfAbsent(collection: string, idColumn: string, id: unknown, document: StorageDocument): Promise<boolean>;

  removeOneByColumn(collection: string, column: string, value: unknown): Promise<number>;
  removeOneByFilter(collection: string, filter: DocumentFilter): Promise<number>;
  removeManyByColumn(collection: string, column: string, value: unknown): Promise<number>;
  removeManyByFilter(collection: string, filter: DocumentFilter): Promise<number>;

  updateOne(collection: string, idColumn: string, id: unknown, document: StorageDocument): Promise<void>;
  updateMany(collection: string, idColumn: string, id: unknown, document: StorageDocument): Promise<void>;
}

export interface MongoStorageConfig {
  address: string;
  port: number;
  username: string;
  password: string;
  database: string;
}

export interface LocalStorageConfig {
  storageFolder: string;
}

export type StorageConfig = MongoStorageConfig | LocalStorageConfig;

export function isMongoStorageConfig(config: StorageConfig): config is MongoStorageConfig {
  return 'database' in config;
}
