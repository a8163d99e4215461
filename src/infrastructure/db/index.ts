export { events } from './schema.js';
export type { EventRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, SqlConnection } from './client.js';
export { PgRecordStore } from './pg-record-store.js';
