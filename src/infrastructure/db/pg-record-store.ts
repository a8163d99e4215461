import { and, asc, eq, gt, type SQL } from 'drizzle-orm';
import type { Event, StatusFilter } from '../../domain/index.js';
import type { RecordStore } from '../store/record-store.js';
import { withStorageErrors } from '../store/record-store.js';
import type { Database, SqlConnection } from './client.js';
import { events, type EventRow } from './schema.js';

function toRow(record: Event): EventRow {
  return {
    event_id: record.eventId,
    title: record.title,
    description: record.description,
    date: record.date,
    location: record.location,
    capacity: record.capacity,
    organizer: record.organizer,
    status: record.status,
  };
}

function fromRow(row: EventRow): Event {
  return {
    eventId: row.event_id,
    title: row.title,
    description: row.description,
    date: row.date,
    location: row.location,
    capacity: row.capacity,
    organizer: row.organizer,
    status: row.status,
  };
}

/**
 * Record store backed by a single PostgreSQL table.
 *
 * Scans page by keyset on `event_id` so a large table is read in bounded
 * chunks; the caller still receives the complete result set.
 */
export class PgRecordStore implements RecordStore {
  readonly driver = 'postgres' as const;

  constructor(
    private readonly db: Database,
    private readonly sql: SqlConnection,
    private readonly pageSize: number,
  ) {}

  /** Creates the table and status index if they are missing. Mirrors `schema.ts`. */
  async ensureSchema(): Promise<void> {
    await withStorageErrors('ensureSchema', async () => {
      await this.sql.unsafe(`
        CREATE TABLE IF NOT EXISTS events (
          event_id     VARCHAR(2048) PRIMARY KEY,
          title        TEXT          NOT NULL,
          description  TEXT          NOT NULL,
          date         VARCHAR(10)   NOT NULL,
          location     TEXT          NOT NULL,
          capacity     INTEGER       NOT NULL,
          organizer    TEXT          NOT NULL,
          status       TEXT          NOT NULL,
          CONSTRAINT events_capacity_check CHECK (capacity >= 0)
        )
      `);
      await this.sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_status ON events (status)`);
    });
  }

  /** INSERT … ON CONFLICT (event_id) DO UPDATE: last writer wins. */
  async put(record: Event): Promise<void> {
    const row = toRow(record);
    await withStorageErrors('put', async () => {
      await this.db
        .insert(events)
        .values(row)
        .onConflictDoUpdate({
          target: events.event_id,
          set: {
            title: row.title,
            description: row.description,
            date: row.date,
            location: row.location,
            capacity: row.capacity,
            organizer: row.organizer,
            status: row.status,
          },
        });
    });
  }

  async get(eventId: string): Promise<Event | undefined> {
    return withStorageErrors('get', async () => {
      const rows = await this.db
        .select()
        .from(events)
        .where(eq(events.event_id, eventId))
        .limit(1);
      const row = rows[0];
      return row ? fromRow(row) : undefined;
    });
  }

  async scan(filter?: StatusFilter): Promise<Event[]> {
    return withStorageErrors('scan', async () => {
      const result: Event[] = [];
      let lastKey: string | undefined;

      for (;;) {
        const conditions: SQL[] = [];
        if (filter !== undefined) {
          conditions.push(eq(events[filter.attribute], filter.value));
        }
        if (lastKey !== undefined) {
          conditions.push(gt(events.event_id, lastKey));
        }

        const page = await this.db
          .select()
          .from(events)
          .where(conditions.length > 0 ? and(...conditions) : undefined)
          .orderBy(asc(events.event_id))
          .limit(this.pageSize);

        for (const row of page) {
          result.push(fromRow(row));
        }

        const last = page.at(-1);
        if (page.length < this.pageSize || last === undefined) break;
        lastKey = last.event_id;
      }

      return result;
    });
  }

  async delete(eventId: string): Promise<boolean> {
    return withStorageErrors('delete', async () => {
      const rows = await this.db
        .delete(events)
        .where(eq(events.event_id, eventId))
        .returning({ event_id: events.event_id });
      return rows.length > 0;
    });
  }

  async close(): Promise<void> {
    await withStorageErrors('close', async () => {
      await this.sql.end();
    });
  }
}
