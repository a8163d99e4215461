export { createDocumentClient } from './client.js';
export type { DynamoClientOptions } from './client.js';
export { DynamoRecordStore } from './dynamo-record-store.js';
export type { DynamoRecordStoreOptions } from './dynamo-record-store.js';
