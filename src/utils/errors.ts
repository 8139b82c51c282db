/**
 * Typed failures raised by the tracking engine
 *
 * The tool and transport layers translate these into result codes and HTTP
 * statuses. Nothing in the engine retries.
 */

export type TrackingErrorKind = 'conflict' | 'not_found' | 'invalid_state' | 'validation';

const ERROR_CODES: Record<TrackingErrorKind, string> = {
  conflict: 'CONFLICT',
  not_found: 'NOT_FOUND',
  invalid_state: 'INVALID_STATE',
  validation: 'VALIDATION_ERROR',
};

const HTTP_STATUS: Record<string, number> = {
  CONFLICT: 409,
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  VALIDATION_ERROR: 400,
};

export class TrackingError extends Error {
  readonly kind: TrackingErrorKind;

  constructor(kind: TrackingErrorKind, message: string) {
    super(message);
    this.name = 'TrackingError';
    this.kind = kind;
  }

  get code(): string {
    return ERROR_CODES[this.kind];
  }
}

export function conflict(message: string): TrackingError {
  return new TrackingError('conflict', message);
}

export function notFound(message: string): TrackingError {
  return new TrackingError('not_found', message);
}

export function invalidState(message: string): TrackingError {
  return new TrackingError('invalid_state', message);
}

export function validationError(message: string): TrackingError {
  return new TrackingError('validation', message);
}

export function isTrackingError(error: unknown): error is TrackingError {
  return error instanceof TrackingError;
}

/**
 * HTTP status for a tool result code, 500 for anything unknown
 */
export function httpStatusForCode(code: string | undefined): number {
  if (!code) return 500;
  return HTTP_STATUS[code] ?? 500;
}
