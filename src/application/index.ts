export {
  createEventSchema,
  updateEventSchema,
  eventRecordSchema,
  listQuerySchema,
  formatIssues,
  isCalendarDate,
} from './event-schema.js';
export type { CreateEventInput, UpdateEventInput, EventRecord, ListQuery } from './event-schema.js';
export {
  createEvent,
  getEvent,
  listEvents,
  updateEvent,
  deleteEvent,
  mergePatch,
} from './event-service.js';
