import {
  DeleteCommand,
  GetCommand,
  PutCommand,
  ScanCommand,
  type DynamoDBDocumentClient,
  type ScanCommandInput,
  type ScanCommandOutput,
} from '@aws-sdk/lib-dynamodb';
import type { Event, StatusFilter } from '../../domain/index.js';
import { eventRecordSchema, formatIssues } from '../../application/event-schema.js';
import type { RecordStore, StoreOperation } from '../store/record-store.js';
import { StorageError, withStorageErrors } from '../store/record-store.js';

export interface DynamoRecordStoreOptions {
  tableName: string;
  /** Items evaluated per Scan request. */
  pageSize: number;
}

/**
 * Checks an item read back from the table. Items written by other tools
 * may not match the Event shape; those surface as a storage failure.
 */
function toEvent(operation: StoreOperation, item: Record<string, unknown>): Event {
  const parsed = eventRecordSchema.safeParse(item);
  if (!parsed.success) {
    const id = typeof item['eventId'] === 'string' ? item['eventId'] : '<unknown>';
    throw new StorageError(
      operation,
      new Error(`Malformed item '${id}': ${formatIssues(parsed.error).join('; ')}`),
    );
  }
  return parsed.data;
}

/**
 * Record store backed by a DynamoDB table whose partition key is
 * `eventId` (string).
 */
export class DynamoRecordStore implements RecordStore {
  readonly driver = 'dynamodb' as const;

  constructor(
    private readonly doc: DynamoDBDocumentClient,
    private readonly options: DynamoRecordStoreOptions,
  ) {}

  async put(record: Event): Promise<void> {
    await withStorageErrors('put', async () => {
      await this.doc.send(new PutCommand({
        TableName: this.options.tableName,
        Item: { ...record },
      }));
    });
  }

  async get(eventId: string): Promise<Event | undefined> {
    return withStorageErrors('get', async () => {
      const res = await this.doc.send(new GetCommand({
        TableName: this.options.tableName,
        Key: { eventId },
      }));
      return res.Item ? toEvent('get', res.Item) : undefined;
    });
  }

  /**
   * Full-table Scan. The status predicate is sent as a FilterExpression;
   * pages are followed through `LastEvaluatedKey` until the table is
   * exhausted.
   */
  async scan(filter?: StatusFilter): Promise<Event[]> {
    return withStorageErrors('scan', async () => {
      const base: ScanCommandInput = {
        TableName: this.options.tableName,
        Limit: this.options.pageSize,
        ...(filter
          ? {
              FilterExpression: '#attr = :value',
              ExpressionAttributeNames: { '#attr': filter.attribute },
              ExpressionAttributeValues: { ':value': filter.value },
            }
          : {}),
      };

      const items: Event[] = [];
      let startKey: ScanCommandOutput['LastEvaluatedKey'];

      do {
        const page: ScanCommandOutput = await this.doc.send(new ScanCommand({
          ...base,
          ...(startKey ? { ExclusiveStartKey: startKey } : {}),
        }));
        for (const item of page.Items ?? []) {
          items.push(toEvent('scan', item));
        }
        startKey = page.LastEvaluatedKey;
      } while (startKey !== undefined);

      return items;
    });
  }

  async delete(eventId: string): Promise<boolean> {
    return withStorageErrors('delete', async () => {
      const res = await this.doc.send(new DeleteCommand({
        TableName: this.options.tableName,
        Key: { eventId },
        ReturnValues: 'ALL_OLD',
      }));
      return res.Attributes !== undefined;
    });
  }

  async close(): Promise<void> {
    this.doc.destroy();
  }
}
