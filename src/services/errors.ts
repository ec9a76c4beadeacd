/**
 * Error taxonomy shared by the pipeline and the API
 */

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'PARSE_ERROR'
  | 'API_ERROR'
  | 'RATE_LIMIT'
  | 'TIMEOUT'
  | 'RESOURCE_NOT_FOUND'
  | 'INTERNAL_ERROR';

export interface SnapshotErrorJson {
  error: ErrorCode;
  message: string;
  details: Record<string, unknown>;
}

export class SnapshotError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SnapshotError';
    this.code = code;
    this.details = details;
  }

  toJSON(): SnapshotErrorJson {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isSnapshotError(err: unknown): err is SnapshotError {
  return err instanceof SnapshotError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

export function errorType(err: unknown): string {
  if (err instanceof Error) return err.name;
  return typeof err;
}

const HTTP_STATUS: Record<ErrorCode, number> = {
  INVALID_INPUT: 400,
  RESOURCE_NOT_FOUND: 404,
  PARSE_ERROR: 422,
  RATE_LIMIT: 429,
  API_ERROR: 502,
  TIMEOUT: 504,
  INTERNAL_ERROR: 500,
};

export function httpStatusFor(code: ErrorCode): number {
  return HTTP_STATUS[code];
}
