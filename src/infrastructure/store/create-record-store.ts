import type { BaseLogger } from 'pino';
import type { StoreConfig } from '../../config.js';
import { createDbClient, PgRecordStore } from '../db/index.js';
import { createDocumentClient, DynamoRecordStore } from '../dynamodb/index.js';
import { InMemoryRecordStore } from './in-memory-record-store.js';
import type { RecordStore } from './record-store.js';

/**
 * Builds the record store selected by `config.driver`.
 *
 * The postgres driver creates its table on first use; DynamoDB tables are
 * provisioned outside the service.
 */
export async function createRecordStore(config: StoreConfig, log: BaseLogger): Promise<RecordStore> {
  switch (config.driver) {
    case 'memory':
      log.warn('Using the in-memory record store; records are lost on restart');
      return new InMemoryRecordStore();

    case 'postgres': {
      const { sql, db } = createDbClient(config.databaseUrl);
      const store = new PgRecordStore(db, sql, config.pageSize);
      await store.ensureSchema();
      log.info('PostgreSQL record store ready');
      return store;
    }

    case 'dynamodb': {
      const doc = createDocumentClient({ region: config.region, endpoint: config.endpoint });
      log.info({ table: config.tableName }, 'DynamoDB record store ready');
      return new DynamoRecordStore(doc, {
        tableName: config.tableName,
        pageSize: config.pageSize,
      });
    }
  }
}
