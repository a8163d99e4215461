import type Redis from 'ioredis';
import type { BaseLogger } from 'pino';

/** Channel carrying one message per successful create, update or delete. */
export const CHANGE_CHANNEL = 'events_changed';

export type EventChangeReason = 'create' | 'update' | 'delete';

export interface EventChangePayload {
  ts: string;
  reason: EventChangeReason;
  event_id: string;
}

export function changePayload(
  reason: EventChangeReason,
  eventId: string,
  at: Date = new Date(),
): EventChangePayload {
  return { ts: at.toISOString(), reason, event_id: eventId };
}

/**
 * Announces a write on `CHANGE_CHANNEL`.
 *
 * Resolves once Redis has taken the message or the attempt has failed.
 * A failure only produces a log line; the write it describes stands.
 */
export async function publishEventChange(
  redis: Pick<Redis, 'publish'>,
  log: BaseLogger,
  reason: EventChangeReason,
  eventId: string,
): Promise<void> {
  const message = JSON.stringify(changePayload(reason, eventId));
  try {
    const receivers = await redis.publish(CHANGE_CHANNEL, message);
    log.debug({ reason, eventId, receivers }, 'Event change announced');
  } catch (err: unknown) {
    log.error({ err, reason, eventId }, 'Event change announcement failed');
  }
}
