import { parseNodeRecord } from '../../serialization/record-parser';
import { NodeRecord } from '../../types/records';
import type { IRecordStore, RecordStoreSaveOptions } from '../interfaces';

/**
 * In-memory record store
 * Keeps records as JSON text, so stored records never share state with the
 * caller's objects (lost on process restart)
 * @category Providers
 */
export class MemoryRecordStore implements IRecordStore {
  private readonly storage = new Map<string, { text: string; expires?: number }>();

  async save(key: string, record: NodeRecord, options?: RecordStoreSaveOptions): Promise<void> {
    // Serialize first; the stored entry is only replaced once that succeeded
    const text = JSON.stringify(record);
    this.storage.set(key, {
      text,
      expires: options?.ttl ? Date.now() + options.ttl * 1000 : undefined,
    });
  }

  async load(key: string): Promise<NodeRecord | null> {
    const item = this.storage.get(key);

    if (!item) {
      return null;
    }

    // Check expiration
    if (item.expires && item.expires < Date.now()) {
      this.storage.delete(key);
      return null;
    }

    return parseNodeRecord(JSON.parse(item.text), key);
  }

  async delete(key: string): Promise<void> {
    this.storage.delete(key);
  }

  async keys(): Promise<string[]> {
    return Array.from(this.storage.keys());
  }

  /**
   * Clears all stored records
   */
  clear(): void {
    this.storage.clear();
  }
}
