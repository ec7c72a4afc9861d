export type CityViewErrorCode =
  | 'CITY_NOT_FOUND'
  | 'AMBIGUOUS_CITY'
  | 'MISSING_FIELD'
  | 'INVALID_FIELD'
  | 'UNKNOWN_THEME'
  | 'INVALID_THEME'
  | 'UNSUPPORTED_PAPER_SIZE'
  | 'UNSUPPORTED_FORMAT'
  | 'INVALID_EXPORT_OPTION'
  | 'MAP_DATA_UNAVAILABLE'
  | 'GEOCODING_FAILED';

export class CityViewError extends Error {
  readonly code: CityViewErrorCode;
  readonly cause?: unknown;
  /** Structured context for callers that want more than the message (e.g. the list of candidates). */
  readonly details: Record<string, unknown>;

  constructor(code: CityViewErrorCode, message: string, cause?: unknown, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CityViewError';
    this.code = code;
    this.cause = cause;
    this.details = details ?? {};
  }
}

export function isCityViewError(error: unknown): error is CityViewError {
  return error instanceof CityViewError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
