import { NodeRecord } from '../../types/records';

export interface RecordStoreSaveOptions {
  /**
   * Time to live in seconds
   */
  ttl?: number;
}

/**
 * Storage boundary for node records exchanged with workers
 * @category Providers
 */
export interface IRecordStore {
  /**
   * Stores a record. A failed save leaves the previously stored record intact.
   */
  save(key: string, record: NodeRecord, options?: RecordStoreSaveOptions): Promise<void>;

  load(key: string): Promise<NodeRecord | null>;

  delete(key: string): Promise<void>;

  keys(): Promise<string[]>;
}
