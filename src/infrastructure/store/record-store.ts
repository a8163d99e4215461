import type { Event, StatusFilter } from '../../domain/index.js';

export type StoreDriver = 'dynamodb' | 'postgres' | 'memory';

export type StoreOperation = 'put' | 'get' | 'scan' | 'delete' | 'ensureSchema' | 'close';

/**
 * Persistence contract consumed by the Event Service.
 *
 * - `put` is an unconditional upsert by `eventId`.
 * - `get` resolves `undefined` when absent; absence is not an error here.
 * - `scan` returns the complete result set, following the driver's
 *   continuation tokens until exhausted. The filter is evaluated by the
 *   store, never by the caller.
 * - `delete` reports whether a record existed beforehand.
 *
 * Every failure surfaces as a `StorageError`.
 */
export interface RecordStore {
  readonly driver: StoreDriver;
  put(record: Event): Promise<void>;
  get(eventId: string): Promise<Event | undefined>;
  scan(filter?: StatusFilter): Promise<Event[]>;
  delete(eventId: string): Promise<boolean>;
  close(): Promise<void>;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return 'unknown error';
}

/** Opaque storage-layer failure. The original driver error is kept as `cause`. */
export class StorageError extends Error {
  readonly operation: StoreOperation;

  constructor(operation: StoreOperation, cause: unknown) {
    super(`Storage failure during ${operation}: ${describeCause(cause)}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
  }
}

/**
 * Runs a driver call and rethrows anything it raises as a `StorageError`.
 * Errors that already are `StorageError`s pass through untouched.
 */
export async function withStorageErrors<T>(
  operation: StoreOperation,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(operation, err);
  }
}
