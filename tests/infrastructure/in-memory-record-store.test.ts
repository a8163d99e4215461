import { describe, it, expect } from 'vitest';
import { InMemoryRecordStore } from '../../src/infrastructure/store/in-memory-record-store.js';
import { makeEvent } from '../helpers.js';

describe('InMemoryRecordStore', () => {
  it('seeds from initial records', async () => {
    const a = makeEvent();
    const b = makeEvent();
    const store = new InMemoryRecordStore([a, b]);

    expect(store.size).toBe(2);
    expect(await store.get(a.eventId)).toEqual(a);
  });

  it('returns undefined for an unknown id', async () => {
    const store = new InMemoryRecordStore();
    expect(await store.get('nope')).toBeUndefined();
  });

  it('put overwrites by eventId', async () => {
    const store = new InMemoryRecordStore();
    await store.put(makeEvent({ eventId: 'x', title: 'One' }));
    await store.put(makeEvent({ eventId: 'x', title: 'Two' }));

    expect(store.size).toBe(1);
    expect((await store.get('x'))?.title).toBe('Two');
  });

  it('hands out copies, not stored references', async () => {
    const store = new InMemoryRecordStore();
    const record = { ...makeEvent({ eventId: 'c1' }) };
    await store.put(record);

    const fetched = await store.get('c1');
    expect(fetched).not.toBe(record);
    expect(fetched).toEqual(record);
  });

  it('scan filters on status and keeps insertion order', async () => {
    const a = makeEvent({ status: 'open' });
    const b = makeEvent({ status: 'closed' });
    const c = makeEvent({ status: 'open' });
    const store = new InMemoryRecordStore([a, b, c]);

    expect(await store.scan()).toEqual([a, b, c]);
    expect(await store.scan({ attribute: 'status', value: 'open' })).toEqual([a, c]);
    expect(await store.scan({ attribute: 'status', value: 'missing' })).toEqual([]);
  });

  it('delete reports whether a record existed', async () => {
    const record = makeEvent();
    const store = new InMemoryRecordStore([record]);

    expect(await store.delete(record.eventId)).toBe(true);
    expect(await store.delete(record.eventId)).toBe(false);
  });

  it('close drops all records', async () => {
    const store = new InMemoryRecordStore([makeEvent()]);
    await store.close();
    expect(store.size).toBe(0);
  });
});
