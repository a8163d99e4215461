/**
 * Domain outcomes for Event Service operations.
 *
 * Operations resolve to a tagged result instead of throwing, so the HTTP
 * layer (or any other caller) can switch on `error.kind`.
 */

export type EventError =
  | { readonly kind: 'not_found'; readonly eventId: string; readonly message: string }
  | { readonly kind: 'validation'; readonly issues: readonly string[]; readonly message: string }
  | { readonly kind: 'storage'; readonly message: string; readonly cause: unknown };

export type EventErrorKind = EventError['kind'];

export type EventOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: EventError };

export function ok<T>(value: T): EventOutcome<T> {
  return { ok: true, value };
}

export function fail<T>(error: EventError): EventOutcome<T> {
  return { ok: false, error };
}

export function notFound(eventId: string): EventError {
  return {
    kind: 'not_found',
    eventId,
    message: `Event with id '${eventId}' not found`,
  };
}

export function validationFailed(issues: readonly string[]): EventError {
  return {
    kind: 'validation',
    issues,
    message: issues.length > 0 ? issues.join('; ') : 'Validation failed',
  };
}

export function storageFailed(message: string, cause: unknown): EventError {
  return { kind: 'storage', message, cause };
}
