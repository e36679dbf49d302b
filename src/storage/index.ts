export type { RecordStore } from './RecordStore';
export { summarize } from './RecordStore';
export { FileRecordStore } from './FileRecordStore';
export { MongoRecordStore, fromMongoCollection } from './MongoRecordStore';
export type { RecordCollection } from './MongoRecordStore';
export { InMemoryRecordStore } from './InMemoryRecordStore';
