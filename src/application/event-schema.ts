import { z } from 'zod';

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Returns true if `value` is a canonical `YYYY-MM-DD` string naming a real
 * Gregorian calendar day (`2024-02-30` and `2024-1-05` are both rejected).
 */
export function isCalendarDate(value: string): boolean {
  const match = DATE_RE.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const parsed = new Date(Date.UTC(year, month - 1, day));

  // Date.UTC maps 0..99 to 1900..1999; pin the year explicitly.
  parsed.setUTCFullYear(year);

  return (
    parsed.getUTCFullYear() === year
    && parsed.getUTCMonth() === month - 1
    && parsed.getUTCDate() === day
  );
}

/** Largest capacity every store driver holds (Postgres INTEGER). */
export const MAX_CAPACITY = 2_147_483_647;

/** DynamoDB partition keys and the Postgres key column both stop at 2048. */
export const MAX_EVENT_ID_BYTES = 2048;

const nonEmpty = z.string().min(1);

const eventIdValue = z.string().refine(
  (value) => Buffer.byteLength(value, 'utf8') <= MAX_EVENT_ID_BYTES,
  { message: `eventId must be at most ${MAX_EVENT_ID_BYTES} bytes` },
);

const calendarDate = z.string().refine(isCalendarDate, {
  message: 'Date must be in YYYY-MM-DD format',
});

/** Field rules shared by the create, update and stored-record schemas. */
const eventFields = {
  title: nonEmpty,
  description: z.string(),
  date: calendarDate,
  location: nonEmpty,
  capacity: z.number().int().min(0).max(MAX_CAPACITY),
  organizer: nonEmpty,
  status: nonEmpty,
};

/**
 * Schema for POST /events.
 *
 * - All seven fields are required; `eventId` is optional and, when empty
 *   or null, replaced by a generated identifier.
 * - No coercion: `"5"` is not a capacity.
 * - Unknown keys are rejected.
 */
export const createEventSchema = z.object({
  eventId: eventIdValue.nullable().optional(),
  ...eventFields,
}).strict();

export type CreateEventInput = z.infer<typeof createEventSchema>;

/**
 * Schema for PUT/PATCH /events/:eventId (partial update).
 *
 * Every field is optional but a present field must be valid: `null` is
 * not a way to clear a value. `eventId` is immutable and therefore an
 * unrecognized key here.
 */
export const updateEventSchema = z.object(eventFields).partial().strict();

export type UpdateEventInput = z.infer<typeof updateEventSchema>;

/**
 * A complete, persisted Event. Used to re-validate merged records before
 * they are written and rows/items read back from a store.
 */
export const eventRecordSchema = z.object({
  eventId: nonEmpty.pipe(eventIdValue),
  ...eventFields,
});

export type EventRecord = z.infer<typeof eventRecordSchema>;

/** Renders zod issues as `path: message` lines. Root-level issues use `body`. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'body';
    return `${path}: ${issue.message}`;
  });
}

/** Querystring for GET /events. A repeated `status` is rejected. */
export const listQuerySchema = z.object({
  status: z.string().optional(),
});

export type ListQuery = z.infer<typeof listQuerySchema>;
