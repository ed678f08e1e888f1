export const ErrorCode = {
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_DATE_RANGE: 'INVALID_DATE_RANGE',
  RATE_LIMITED: 'RATE_LIMITED',
  NOT_FOUND: 'NOT_FOUND',
  UPSTREAM_NOT_CONFIGURED: 'UPSTREAM_NOT_CONFIGURED',
  UPSTREAM_ERROR: 'UPSTREAM_ERROR',
  SERVER_ERROR: 'SERVER_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

const DEFAULT_MESSAGES: Record<ErrorCode, string> = {
  MISSING_REQUIRED_FIELD: 'Missing required fields',
  VALIDATION_ERROR: 'Invalid request',
  INVALID_DATE_RANGE: 'Check-out date must be after check-in date',
  RATE_LIMITED: 'Too many requests, please try again later',
  NOT_FOUND: 'Not found',
  UPSTREAM_NOT_CONFIGURED: 'Upstream provider not configured',
  UPSTREAM_ERROR: 'Upstream provider failed',
  SERVER_ERROR: 'Internal Server Error',
};

const DEFAULT_STATUS: Record<ErrorCode, number> = {
  MISSING_REQUIRED_FIELD: 400,
  VALIDATION_ERROR: 400,
  INVALID_DATE_RANGE: 400,
  RATE_LIMITED: 429,
  NOT_FOUND: 404,
  UPSTREAM_NOT_CONFIGURED: 503,
  UPSTREAM_ERROR: 502,
  SERVER_ERROR: 500,
};

export interface ErrorResponse {
  errorCode: ErrorCode;
  error: string;
  [key: string]: unknown;
}

export function createErrorResponse(
  code: ErrorCode,
  message?: string,
  extra: Record<string, unknown> = {}
): ErrorResponse {
  return { ...extra, errorCode: code, error: message || DEFAULT_MESSAGES[code] };
}

/**
 * Error carrying an ErrorCode, thrown where a failure has a known meaning
 * (bad date ordering, missing API key, upstream error payload).
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, message?: string) {
    super(message || DEFAULT_MESSAGES[code]);
    this.name = 'AppError';
    this.code = code;
    this.status = DEFAULT_STATUS[code];
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
