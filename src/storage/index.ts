/**
 * Storage Adapter
 *
 * Backends share the `Storage` interface; `createStorage` picks one from the
 * configuration shape.
 *
 * @since 2025
 */
import { InitError } from '../utils/errorHandler.js';
import { LocalJSONStorage } from './LocalJSONStorage.js';
import { MongoDBStorage, type MongoDBStorageOptions } from './MongoDBStorage.js';
import { isMongoStorageConfig, type Storage, type StorageConfig } from './Storage.js';

export { DocumentListStorage } from './DocumentListStorage.js';
export { LocalJSONStorage } from './LocalJSONStorage.js';
export { MemoryStorage } from './MemoryStorage.js';
export { MongoDBStorage, buildMongoUrl, maskMongoUrl } from './MongoDBStorage.js';
export type { MongoDBStorageOptions } from './MongoDBStorage.js';
export { applyQuery, matchesFilter, projectColumns } from './documentQuery.js';
export { isMongoStorageConfig } from './Storage.js';
export type { LocalStorageConfig, MongoStorageConfig, Storage, StorageConfig } from './Storage.js';

/**
 * MongoDB when the connection parameters are given, local JSON files when a
 * storage folder is given
 */
export function createStorage(config: StorageConfig, mongoOptions: MongoDBStorageOptions = {}): Storage {
  if (isMongoStorageConfig(config)) {
    return new MongoDBStorage(config, mongoOptions);
  }
  if (config.storageFolder) {
    return new LocalJSONStorage(config.storageFolder);
  }
  throw new InitError('Could not initialize storage class', {
    context: { keys: Object.keys(config) }
  });
}
