/**
 * Error taxonomy shared by the locator, download manager and radargram store.
 *
 * Locator and store errors are thrown to the caller. Download errors never
 * escape a transfer: they are caught and kept as the transfer's `reason`.
 */

/** Remote archive unreachable, or it answered with a non-success status. */
export class NetworkError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NetworkError';
    this.status = status;
  }
}

/** Local filesystem refused a write, flush, or rename. */
export class StorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/** Downloaded bytes do not match the descriptor's size or checksum. */
export class IntegrityError extends Error {
  readonly expected: string;
  readonly actual: string;

  constructor(message: string, expected: string, actual: string) {
    super(message);
    this.name = 'IntegrityError';
    this.expected = expected;
    this.actual = actual;
  }
}

export type FormatErrorReason = 'missing' | 'corrupt';

/**
 * Local radargram cannot be opened. `missing` means "not downloaded yet",
 * `corrupt` means the file exists but is malformed.
 */
export class FormatError extends Error {
  readonly reason: FormatErrorReason;
  readonly path: string;

  constructor(message: string, path: string, reason: FormatErrorReason = 'corrupt', options?: ErrorOptions) {
    super(message, options);
    this.name = 'FormatError';
    this.path = path;
    this.reason = reason;
  }
}

/** Configuration is missing something an operation needs (root dir, token). */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Segment cannot be fetched by this core (not public, or unknown method). */
export class UnsupportedDownloadError extends Error {
  readonly segmentId: string;

  constructor(message: string, segmentId: string) {
    super(message);
    this.name = 'UnsupportedDownloadError';
    this.segmentId = segmentId;
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/** Message text for any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
