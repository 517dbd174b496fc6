export type TrackerErrorCode =
  | 'FETCH'
  | 'PARSE'
  | 'NO_CANDIDATE'
  | 'DISPATCH'
  | 'DUPLICATE'
  | 'CONFIG';

export class TrackerError extends Error {
  constructor(message: string, public readonly code: TrackerErrorCode, public readonly cause?: unknown) {
    super(message);
    this.name = 'TrackerError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Upstream feed unreachable, non-2xx, timed out or unreadable as a document. */
export class FetchError extends TrackerError {
  constructor(message: string, public readonly url: string, cause?: unknown) {
    super(message, 'FETCH', cause);
    this.name = 'FetchError';
  }
}

export type ParseErrorKind = 'no-episode' | 'batch';

export class ParseError extends TrackerError {
  constructor(message: string, public readonly kind: ParseErrorKind, public readonly title: string) {
    super(message, 'PARSE');
    this.name = 'ParseError';
  }
}

/** No acceptable release this cycle. Normal outcome, not a failure. */
export class NoCandidateError extends TrackerError {
  constructor(message: string) {
    super(message, 'NO_CANDIDATE');
    this.name = 'NoCandidateError';
  }
}

export type DispatchFailureReason = 'network' | 'auth' | 'rejected' | 'session';

export class DispatchError extends TrackerError {
  constructor(message: string, public readonly reason: DispatchFailureReason, cause?: unknown) {
    super(message, 'DISPATCH', cause);
    this.name = 'DispatchError';
  }
}

export class DuplicateDownloadError extends TrackerError {
  constructor(message: string, public readonly showId: number, public readonly episode: number) {
    super(message, 'DUPLICATE');
    this.name = 'DuplicateDownloadError';
  }
}

export class ConfigError extends TrackerError {
  constructor(message: string, public readonly subject?: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
