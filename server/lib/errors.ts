/**
 * Error taxonomy for the scanner plus pure error-classification predicates.
 *
 * Kept in lib/ so utilities like mapWithConcurrency and RetryPolicy can depend
 * on them without creating a lib → services dependency cycle.
 */

export interface SourceFailure {
  source: string;
  message: string;
}

/** No symbol-list source produced a usable universe. */
export class SourceUnavailableError extends Error {
  readonly failures: SourceFailure[];

  constructor(failures: SourceFailure[], message?: string) {
    const detail = failures.map((f) => `${f.source}: ${f.message}`).join('; ');
    super(message || `All symbol sources failed${detail ? ` (${detail})` : ''}`);
    this.name = 'SourceUnavailableError';
    this.failures = failures;
  }
}

export type FetchErrorKind = 'NotFound' | 'RateLimited' | 'Timeout' | 'MalformedResponse' | 'Upstream';

/**
 * Per-symbol history failure. Never escapes a scan worker; it is folded into
 * the symbol's ScanRecord instead.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly httpStatus: number | null;
  /** Only meaningful for Upstream errors: false for 4xx rejections that will not heal on retry. */
  readonly transient: boolean;
  /** Server-suggested wait (Retry-After), if any. */
  readonly retryAfterMs: number | null;

  constructor(
    kind: FetchErrorKind,
    message: string,
    options: { httpStatus?: number | null; transient?: boolean; retryAfterMs?: number | null } = {},
  ) {
    super(message);
    this.name = 'FetchError';
    this.kind = kind;
    this.httpStatus = options.httpStatus ?? null;
    this.transient = options.transient ?? (kind === 'RateLimited' || kind === 'Timeout' || kind === 'Upstream');
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

export class AlreadyRunningError extends Error {
  readonly httpStatus = 409;

  constructor(message = 'Scan already running') {
    super(message);
    this.name = 'AlreadyRunningError';
  }
}

/** A snapshot or cache file could not be durably written. */
export class StorageError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${path}: ${reason}`, { cause });
    this.name = 'StorageError';
    this.path = path;
  }
}

/** A run was stopped before it could publish. */
export class ScanStoppedError extends Error {
  constructor(message = 'Scan stopped before completion') {
    super(message);
    this.name = 'ScanStoppedError';
  }
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, an HTTP 499 status, or an error message containing "aborted" /
 * "aborterror" (case-insensitive). A FetchError is a classified upstream
 * failure and never counts, whatever its message quotes from the response.
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object' || err instanceof FetchError) return false;
  const name = 'name' in err ? String(err.name || '') : '';
  const message = 'message' in err ? String(err.message || '') : '';
  const httpStatus = 'httpStatus' in err ? Number(err.httpStatus) : NaN;
  return name === 'AbortError' || httpStatus === 499 || /aborted|aborterror/i.test(message);
}

export function buildRequestAbortError(message?: string): Error {
  const err = new Error(message || 'Request aborted');
  err.name = 'AbortError';
  return err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The `code` of a Node system error (ENOENT, ECONNRESET, …), if any. */
export function errnoCode(err: unknown): string | null {
  if (!err || typeof err !== 'object' || !('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}
