/**
 * Local JSON Storage
 *
 * Keeps each collection as `<folder>/<collection>.json`, a JSON array of
 * documents. A collection without a file is empty; the file appears on the first
 * write. Writes go to a temporary file which is then renamed over the original,
 * so a crash mid-write leaves the previous content in place.
 *
 * @since 2025
 */
import fs from 'fs';
import path from 'path';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { StorageDocument } from '../types/index.js';
import { StorageError } from '../utils/errorHandler.js';
import { isDocumentList } from './documentQuery.js';
import { DocumentListStorage } from './DocumentListStorage.js';

const COLLECTION_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export class LocalJSONStorage extends DocumentListStorage {
  private readonly folder: string;

  constructor(storageFolder: string) {
    super();
    this.folder = path.resolve(storageFolder);
  }

  get storageFolder(): string {
    return this.folder;
  }

  /**
   * Creates the storage folder when missing
   */
  async connect(): Promise<void> {
    await fs.promises.mkdir(this.folder, { recursive: true });
    LogEngine.info('Local JSON storage initialized', { folder: this.folder });
  }

  async disconnect(): Promise<void> {
    LogEngine.info('Local JSON storage closed', { folder: this.folder });
  }

  protected async readCollection(collection: string): Promise<StorageDocument[]> {
    const filePath = this.collectionPath(collection);
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    if (raw.trim() === '') {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(`Collection file ${filePath} is not valid JSON`, {
        context: { collection, filePath },
        cause: error
      });
    }

    if (!isDocumentList(parsed)) {
      throw new StorageError(`Collection file ${filePath} must hold a JSON array of objects`, {
        context: { collection, filePath }
      });
    }
    return parsed;
  }

  protected async writeCollection(collection: string, documents: StorageDocument[]): Promise<void> {
    const filePath = this.collectionPath(collection);
    const tempPath = `${filePath}.${process.pid}.tmp`;

    await fs.promises.mkdir(this.folder, { recursive: true });
    await fs.promises.writeFile(tempPath, JSON.stringify(documents, null, 2), 'utf8');
    await fs.promises.rename(tempPath, filePath);

    LogEngine.debug('Collection written', {
      collection,
      documents: documents.length
    });
  }

  private collectionPath(collection: string): string {
    if (!COLLECTION_NAME_PATTERN.test(collection) || collection.startsWith('.')) {
      throw new StorageError(`Invalid collection name: ${collection}`, {
        context: { collection }
      });
    }
    return path.join(this.folder, `${collection}.json`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
