export type { Event, NewEvent, EventPatch, UpdatableField, StatusFilter } from './event.js';
export { UPDATABLE_FIELDS } from './event.js';
export type { EventError, EventErrorKind, EventOutcome } from './errors.js';
export { ok, fail, notFound, validationFailed, storageFailed } from './errors.js';
