import type { Event, NewEvent } from '../src/domain/index.js';
import { loadConfig, type AppConfig } from '../src/config.js';

let counter = 0;

/**
 * Factory for creation payloads with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeNewEvent(overrides: Partial<NewEvent> = {}): NewEvent {
  return {
    title: 'Tech Conf',
    description: 'Annual developer conference',
    date: '2024-12-15',
    location: 'SF',
    capacity: 500,
    organizer: 'Acme',
    status: 'scheduled',
    ...overrides,
  };
}

/** Factory for stored records; ids are unique per call unless overridden. */
export function makeEvent(overrides: Partial<Event> = {}): Event {
  counter++;
  return {
    eventId: `evt-${counter}`,
    title: 'Tech Conf',
    description: 'Annual developer conference',
    date: '2024-12-15',
    location: 'SF',
    capacity: 500,
    organizer: 'Acme',
    status: 'scheduled',
    ...overrides,
  };
}

/** Config for in-process tests: memory store, no Redis, silent logs. */
export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ STORE_DRIVER: 'memory', LOG_LEVEL: 'silent', ...env });
}

export const UUID_V4_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
