/**
 * Errors raised by the conversation engine.
 *
 * Rejected input and denied permissions are outcomes, not exceptions: see
 * `Validation` in conversation-types.ts and the `forbidden` status of
 * `DispatchResult`.
 *
 * - UnknownStateError: a (kind, state) pair with no registered rule. A
 *   programming defect, escalated and never silently ignored.
 * - StorageError: an external store call failed or timed out.
 */

export class UnknownStateError extends Error {
  constructor(
    readonly kind: string,
    readonly state: string,
  ) {
    super(`No rule registered for state "${state}" of conversation "${kind}"`);
    this.name = 'UnknownStateError';
  }
}

export type StoragePhase = 'before-mutation' | 'after-mutation';

export class StorageError extends Error {
  constructor(
    message: string,
    readonly phase: StoragePhase = 'before-mutation',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class StoreTimeoutError extends StorageError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`Store operation "${operation}" timed out after ${timeoutMs}ms`);
    this.name = 'StoreTimeoutError';
  }
}

/** Wrap anything thrown by a store call into a StorageError. */
export function toStorageError(err: unknown, phase: StoragePhase = 'before-mutation'): StorageError {
  if (err instanceof StorageError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new StorageError(message, phase, { cause: err });
}
