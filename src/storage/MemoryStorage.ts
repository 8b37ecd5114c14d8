import { LogEngine } from '@wgtechlabs/log-engine';
import type { StorageDocument } from '../types/index.js';
import { DocumentListStorage } from './DocumentListStorage.js';

/**
 * Process-local storage. Nothing survives a restart; collections exist from
 * their first write. Documents are cloned on the way in and out.
 */
export class MemoryStorage extends DocumentListStorage {
  private readonly collections = new Map<string, StorageDocument[]>();

  constructor(seed: Record<string, StorageDocument[]> = {}) {
    super();
    for (const [collection, documents] of Object.entries(seed)) {
      this.collections.set(collection, structuredClone(documents));
    }
  }

  async connect(): Promise<void> {
    LogEngine.debug('Memory storage ready', { collections: this.collections.size });
  }

  async disconnect(): Promise<void> {
    LogEngine.debug('Memory storage released');
  }

  protected async readCollection(collection: string): Promise<StorageDocument[]> {
    return structuredClone(this.collections.get(collection) ?? []);
  }

  protected async writeCollection(collection: string, documents: StorageDocument[]): Promise<void> {
    this.collections.set(collection, structuredClone(documents));
  }
}
