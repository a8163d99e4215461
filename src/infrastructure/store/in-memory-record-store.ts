import type { Event, StatusFilter } from '../../domain/index.js';
import type { RecordStore } from './record-store.js';

/**
 * In-memory record store.
 *
 * Backs local development and the test suite. Records are copied on the
 * way in and out so callers never share references with stored state.
 * Scan order is insertion order.
 */
export class InMemoryRecordStore implements RecordStore {
  readonly driver = 'memory' as const;

  private readonly records: Map<string, Event> = new Map();

  constructor(initial: readonly Event[] = []) {
    for (const record of initial) {
      this.records.set(record.eventId, { ...record });
    }
  }

  /** Number of stored records. */
  get size(): number {
    return this.records.size;
  }

  async put(record: Event): Promise<void> {
    this.records.set(record.eventId, { ...record });
  }

  async get(eventId: string): Promise<Event | undefined> {
    const record = this.records.get(eventId);
    return record ? { ...record } : undefined;
  }

  async scan(filter?: StatusFilter): Promise<Event[]> {
    const all = [...this.records.values()];
    const matching = filter
      ? all.filter((record) => record[filter.attribute] === filter.value)
      : all;
    return matching.map((record) => ({ ...record }));
  }

  async delete(eventId: string): Promise<boolean> {
    return this.records.delete(eventId);
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
