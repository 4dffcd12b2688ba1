export { MemoryRecordStore } from './record-store';
