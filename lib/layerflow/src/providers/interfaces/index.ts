export type { IRecordStore, RecordStoreSaveOptions } from './record-store';
