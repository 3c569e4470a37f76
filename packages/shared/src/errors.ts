/**
 * Pipeline Error Taxonomy
 *
 * Every failure that crosses a stage boundary is one of these classes. The
 * `retryable` flag drives the retry policy; the coordinator records the
 * serialized form in PipelineState.lastError.
 */

export type PipelineErrorCode =
  | 'transient_fetch'
  | 'permanent_fetch'
  | 'extraction'
  | 'transient_extraction'
  | 'validation'
  | 'storage'
  | 'in_flight'
  | 'state_conflict'
  | 'cancelled';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, rate limiting or 5xx from the portal. */
export class TransientFetchError extends PipelineError {
  readonly code = 'transient_fetch';
  readonly retryable = true;

  constructor(
    message: string,
    readonly status?: number,
    readonly retryAfterMs?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** 404/410, other client errors, or a response the portal should never send. */
export class PermanentFetchError extends PipelineError {
  readonly code = 'permanent_fetch';
  readonly retryable = false;

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The document itself cannot be turned into text. */
export class ExtractionError extends PipelineError {
  readonly code = 'extraction';
  readonly retryable = false;
}

/** OCR service unreachable, rate limited, timed out or failing with 5xx. */
export class TransientExtractionError extends PipelineError {
  readonly code = 'transient_extraction';
  readonly retryable = true;
}

export class ValidationError extends PipelineError {
  readonly code = 'validation';
  readonly retryable = false;

  constructor(message: string, readonly errors: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * I/O failure in one of the stores. Retried locally; `fatal` means the store
 * itself is unreachable and the whole run must stop.
 */
export class StorageError extends PipelineError {
  readonly code = 'storage';

  constructor(message: string, readonly fatal: boolean = false, options?: { cause?: unknown }) {
    super(message, options);
  }

  get retryable(): boolean {
    return !this.fatal;
  }
}

/** Another worker holds the lease for this identifier. */
export class InFlightError extends PipelineError {
  readonly code = 'in_flight';
  readonly retryable = false;

  constructor(readonly ada: string, readonly reason: string) {
    super(`Identifier ${ada} is in flight elsewhere: ${reason}`);
  }
}

/** A compare-and-set lost against a concurrent writer. */
export class StateConflictError extends PipelineError {
  readonly code = 'state_conflict';
  readonly retryable = false;

  constructor(readonly ada: string, readonly expectedRevision: number) {
    super(`PipelineState for ${ada} changed (expected revision ${expectedRevision})`);
  }
}

export class CancelledError extends PipelineError {
  readonly code = 'cancelled';
  readonly retryable = false;

  constructor(message = 'Operation cancelled') {
    super(message);
  }
}

export interface ErrorInfo {
  code: PipelineErrorCode | 'unknown';
  name: string;
  message: string;
}

export function isRetryable(error: unknown): boolean {
  return error instanceof PipelineError && error.retryable;
}

export function isFatal(error: unknown): boolean {
  return error instanceof StorageError && error.fatal;
}

export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof PipelineError) {
    return { code: error.code, name: error.name, message: error.message };
  }
  if (error instanceof Error) {
    return { code: 'unknown', name: error.name, message: error.message };
  }
  return { code: 'unknown', name: 'Error', message: String(error) };
}

/**
 * Throw a CancelledError when the signal has fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
