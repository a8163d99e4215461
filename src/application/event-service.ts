import { randomUUID } from 'node:crypto';
import type { Event, EventPatch, NewEvent, StatusFilter, EventOutcome } from '../domain/index.js';
import {
  UPDATABLE_FIELDS,
  ok,
  fail,
  notFound,
  validationFailed,
  storageFailed,
} from '../domain/index.js';
import type { RecordStore, StoreOperation } from '../infrastructure/store/record-store.js';
import { StorageError } from '../infrastructure/store/record-store.js';
import { eventRecordSchema, formatIssues } from './event-schema.js';

/**
 * Runs one store call and converts any failure into a `storage` outcome.
 * The store's error is kept as the cause, uninterpreted.
 */
async function storeCall<T>(operation: StoreOperation, fn: () => Promise<T>): Promise<EventOutcome<T>> {
  try {
    return ok(await fn());
  } catch (err: unknown) {
    const failure = err instanceof StorageError ? err : new StorageError(operation, err);
    return fail(storageFailed(failure.message, failure.cause));
  }
}

/** Validates a complete record; the only gate in front of every write. */
function checkRecord(candidate: Record<keyof Event, unknown>): EventOutcome<Event> {
  const parsed = eventRecordSchema.safeParse(candidate);
  if (!parsed.success) return fail(validationFailed(formatIssues(parsed.error)));
  return ok(parsed.data);
}

/**
 * Overlays the fields the patch actually carries onto the stored record.
 *
 * A field is applied when the patch has an own property of that name, even
 * if the value is empty or zero. `eventId` is never taken from the patch.
 */
export function mergePatch(existing: Event, patch: EventPatch): Record<keyof Event, unknown> {
  const merged: Record<keyof Event, unknown> = { ...existing };
  for (const field of UPDATABLE_FIELDS) {
    if (Object.hasOwn(patch, field)) {
      merged[field] = patch[field];
    }
  }
  merged.eventId = existing.eventId;
  return merged;
}

/**
 * Use case: create an event.
 *
 * A non-empty client-supplied `eventId` is used verbatim; otherwise a
 * random UUID is assigned. The write is an unconditional overwrite, so a
 * duplicate client id replaces the existing record.
 */
export async function createEvent(store: RecordStore, input: NewEvent): Promise<EventOutcome<Event>> {
  const eventId = input.eventId ? input.eventId : randomUUID();

  const checked = checkRecord({
    eventId,
    title: input.title,
    description: input.description,
    date: input.date,
    location: input.location,
    capacity: input.capacity,
    organizer: input.organizer,
    status: input.status,
  });
  if (!checked.ok) return checked;

  const written = await storeCall('put', () => store.put(checked.value));
  if (!written.ok) return fail(written.error);

  return ok(checked.value);
}

/** Use case: fetch a single event. Absence is a `not_found` outcome. */
export async function getEvent(store: RecordStore, eventId: string): Promise<EventOutcome<Event>> {
  const found = await storeCall('get', () => store.get(eventId));
  if (!found.ok) return fail(found.error);
  if (found.value === undefined) return fail(notFound(eventId));
  return ok(found.value);
}

/**
 * Use case: list events, optionally only those with the given status.
 * The predicate is evaluated by the store. An empty status means no filter.
 */
export async function listEvents(store: RecordStore, status?: string): Promise<EventOutcome<Event[]>> {
  const filter: StatusFilter | undefined = status
    ? { attribute: 'status', value: status }
    : undefined;
  return storeCall('scan', () => store.scan(filter));
}

/**
 * Use case: partial update.
 *
 * Read-modify-write against a fresh read: fetch, overlay the present
 * fields, validate the merged record, then overwrite. Never creates.
 */
export async function updateEvent(
  store: RecordStore,
  eventId: string,
  patch: EventPatch,
): Promise<EventOutcome<Event>> {
  const current = await getEvent(store, eventId);
  if (!current.ok) return current;

  const checked = checkRecord(mergePatch(current.value, patch));
  if (!checked.ok) return checked;

  const written = await storeCall('put', () => store.put(checked.value));
  if (!written.ok) return fail(written.error);

  return ok(checked.value);
}

/**
 * Use case: delete an event. Deleting an id that does not exist, including
 * one that was just deleted, is `not_found`.
 */
export async function deleteEvent(store: RecordStore, eventId: string): Promise<EventOutcome<void>> {
  const current = await getEvent(store, eventId);
  if (!current.ok) return fail(current.error);

  const removed = await storeCall('delete', () => store.delete(eventId));
  if (!removed.ok) return fail(removed.error);
  if (!removed.value) return fail(notFound(eventId));

  return ok(undefined);
}
