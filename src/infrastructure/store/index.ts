export type { RecordStore, StoreDriver, StoreOperation } from './record-store.js';
export { StorageError, withStorageErrors } from './record-store.js';
export { InMemoryRecordStore } from './in-memory-record-store.js';
export { createRecordStore } from './create-record-store.js';
export { default as storePlugin } from './store-plugin.js';
export type { StorePluginOptions } from './store-plugin.js';
