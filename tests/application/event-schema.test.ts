import { describe, it, expect } from 'vitest';
import {
  isCalendarDate,
  createEventSchema,
  updateEventSchema,
  eventRecordSchema,
  listQuerySchema,
  formatIssues,
  MAX_CAPACITY,
} from '../../src/application/event-schema.js';
import { makeNewEvent } from '../helpers.js';

/** Runs a schema and returns the formatted issues (empty on success). */
function issuesOf(result: { success: true } | { success: false; error: Parameters<typeof formatIssues>[0] }): string[] {
  return result.success ? [] : formatIssues(result.error);
}

// ─── isCalendarDate ──────────────────────────────────────────

describe('isCalendarDate', () => {
  it('accepts canonical dates', () => {
    expect(isCalendarDate('2024-12-15')).toBe(true);
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('0099-01-01')).toBe(true);
  });

  it('rejects days that do not exist', () => {
    expect(isCalendarDate('2023-02-29')).toBe(false);
    expect(isCalendarDate('2024-02-30')).toBe(false);
    expect(isCalendarDate('2024-13-01')).toBe(false);
    expect(isCalendarDate('2024-00-10')).toBe(false);
  });

  it('rejects non-canonical forms', () => {
    expect(isCalendarDate('2024-1-05')).toBe(false);
    expect(isCalendarDate('2024-12-15T00:00:00Z')).toBe(false);
    expect(isCalendarDate('15/12/2024')).toBe(false);
    expect(isCalendarDate('')).toBe(false);
  });
});

// ─── createEventSchema ───────────────────────────────────────

describe('createEventSchema', () => {
  it('accepts a complete payload without an identifier', () => {
    const result = createEventSchema.safeParse(makeNewEvent());
    expect(result.success).toBe(true);
  });

  it('accepts a client-supplied identifier and null', () => {
    expect(createEventSchema.safeParse(makeNewEvent({ eventId: 'client-1' })).success).toBe(true);
    expect(createEventSchema.safeParse(makeNewEvent({ eventId: null })).success).toBe(true);
  });

  it('accepts an empty description and zero capacity', () => {
    const result = createEventSchema.safeParse(makeNewEvent({ description: '', capacity: 0 }));
    expect(result.success).toBe(true);
  });

  it('reports a missing field', () => {
    const { title: _omitted, ...rest } = makeNewEvent();
    expect(issuesOf(createEventSchema.safeParse(rest))).toEqual(['title: Required']);
  });

  it('rejects negative capacity', () => {
    expect(issuesOf(createEventSchema.safeParse(makeNewEvent({ capacity: -1 }))))
      .toEqual(['capacity: Number must be greater than or equal to 0']);
  });

  it('caps capacity at what the stores can hold', () => {
    expect(createEventSchema.safeParse(makeNewEvent({ capacity: MAX_CAPACITY })).success).toBe(true);
    expect(issuesOf(createEventSchema.safeParse(makeNewEvent({ capacity: MAX_CAPACITY + 1 }))))
      .toEqual(['capacity: Number must be less than or equal to 2147483647']);
    expect(issuesOf(createEventSchema.safeParse(makeNewEvent({ capacity: 1e20 }))))
      .toEqual(['capacity: Number must be less than or equal to 2147483647']);
  });

  it('limits a client identifier to 2048 bytes', () => {
    expect(createEventSchema.safeParse(makeNewEvent({ eventId: 'x'.repeat(2048) })).success).toBe(true);
    expect(issuesOf(createEventSchema.safeParse(makeNewEvent({ eventId: 'x'.repeat(2049) }))))
      .toEqual(['eventId: eventId must be at most 2048 bytes']);
    // 1025 two-byte characters: under 2048 characters, over 2048 bytes
    expect(issuesOf(createEventSchema.safeParse(makeNewEvent({ eventId: 'é'.repeat(1025) }))))
      .toEqual(['eventId: eventId must be at most 2048 bytes']);
  });

  it('rejects fractional capacity', () => {
    expect(issuesOf(createEventSchema.safeParse(makeNewEvent({ capacity: 1.5 }))))
      .toEqual(['capacity: Expected integer, received float']);
  });

  it('does not coerce a numeric string', () => {
    const payload = { ...makeNewEvent(), capacity: '5' };
    expect(issuesOf(createEventSchema.safeParse(payload)))
      .toEqual(['capacity: Expected number, received string']);
  });

  it('rejects empty required strings', () => {
    expect(issuesOf(createEventSchema.safeParse(makeNewEvent({ location: '' }))))
      .toEqual(['location: String must contain at least 1 character(s)']);
  });

  it('rejects a malformed date', () => {
    expect(issuesOf(createEventSchema.safeParse(makeNewEvent({ date: '2024-02-30' }))))
      .toEqual(['date: Date must be in YYYY-MM-DD format']);
  });

  it('rejects unknown keys', () => {
    const payload = { ...makeNewEvent(), venue: 'Hall A' };
    expect(issuesOf(createEventSchema.safeParse(payload)))
      .toEqual(["body: Unrecognized key(s) in object: 'venue'"]);
  });

  it('rejects a non-object body', () => {
    expect(issuesOf(createEventSchema.safeParse(null)))
      .toEqual(['body: Expected object, received null']);
  });
});

// ─── updateEventSchema ───────────────────────────────────────

describe('updateEventSchema', () => {
  it('accepts an empty patch', () => {
    const result = updateEventSchema.safeParse({});
    expect(result.success).toBe(true);
  });

  it('keeps only the keys that were sent', () => {
    const result = updateEventSchema.safeParse({ status: 'cancelled' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(Object.keys(result.data)).toEqual(['status']);
    }
  });

  it('keeps explicit empty and zero values', () => {
    const result = updateEventSchema.safeParse({ description: '', capacity: 0 });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ description: '', capacity: 0 });
    }
  });

  it('rejects null as a way to clear a field', () => {
    expect(issuesOf(updateEventSchema.safeParse({ title: null })))
      .toEqual(['title: Expected string, received null']);
  });

  it('rejects eventId because identifiers are immutable', () => {
    expect(issuesOf(updateEventSchema.safeParse({ eventId: 'other' })))
      .toEqual(["body: Unrecognized key(s) in object: 'eventId'"]);
  });

  it('validates the fields it touches', () => {
    expect(issuesOf(updateEventSchema.safeParse({ capacity: -10 })))
      .toEqual(['capacity: Number must be greater than or equal to 0']);
    expect(issuesOf(updateEventSchema.safeParse({ capacity: MAX_CAPACITY + 1 })))
      .toEqual(['capacity: Number must be less than or equal to 2147483647']);
  });
});

// ─── eventRecordSchema ───────────────────────────────────────

describe('eventRecordSchema', () => {
  it('strips attributes that are not part of an Event', () => {
    const result = eventRecordSchema.safeParse({ ...makeNewEvent(), eventId: 'e1', ttl: 123 });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ ...makeNewEvent(), eventId: 'e1' });
    }
  });

  it('requires a non-empty eventId', () => {
    expect(issuesOf(eventRecordSchema.safeParse({ ...makeNewEvent(), eventId: '' })))
      .toEqual(['eventId: String must contain at least 1 character(s)']);
  });

  it('rejects an eventId longer than 2048 bytes', () => {
    expect(issuesOf(eventRecordSchema.safeParse({ ...makeNewEvent(), eventId: 'k'.repeat(2049) })))
      .toEqual(['eventId: eventId must be at most 2048 bytes']);
  });
});

// ─── listQuerySchema ─────────────────────────────────────────

describe('listQuerySchema', () => {
  it('accepts a missing or single status', () => {
    expect(listQuerySchema.safeParse({}).success).toBe(true);
    expect(listQuerySchema.safeParse({ status: 'active' }).success).toBe(true);
  });

  it('rejects a repeated status', () => {
    expect(issuesOf(listQuerySchema.safeParse({ status: ['a', 'b'] })))
      .toEqual(['status: Expected string, received array']);
  });
});
