/**
 * Core domain types for the event catalog.
 *
 * These types define the canonical shape of an event record as it flows
 * through the system. They carry no framework dependencies.
 */

/**
 * Canonical Event entity.
 *
 * `eventId` is assigned once at creation (client-supplied or generated)
 * and never changes afterwards. Every other field is always present.
 */
export interface Event {
  readonly eventId: string;
  readonly title: string;
  readonly description: string;
  readonly date: string; // YYYY-MM-DD
  readonly location: string;
  readonly capacity: number;
  readonly organizer: string;
  readonly status: string;
}

/** Fields that a partial update may touch. `eventId` is not among them. */
export const UPDATABLE_FIELDS = [
  'title',
  'description',
  'date',
  'location',
  'capacity',
  'organizer',
  'status',
] as const;

export type UpdatableField = (typeof UPDATABLE_FIELDS)[number];

/** Creation payload: every field required except the identifier. */
export interface NewEvent {
  readonly eventId?: string | null;
  readonly title: string;
  readonly description: string;
  readonly date: string;
  readonly location: string;
  readonly capacity: number;
  readonly organizer: string;
  readonly status: string;
}

/**
 * Partial update payload.
 *
 * A field counts as present when the object has an own property of that
 * name, whatever its value. Omitted fields keep their stored value.
 */
export type EventPatch = { readonly [K in UpdatableField]?: Event[K] };

/** The one attribute the record store can filter a scan on. */
export interface StatusFilter {
  readonly attribute: 'status';
  readonly value: string;
}
