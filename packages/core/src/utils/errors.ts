// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Malformed input rejected when a request or state object is constructed. */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly stage?: string,
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

// -- Transient upstream failures (recorded as recoverable) --

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly provider?: string,
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs?: number,
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class ConnectionError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'ConnectionError';
  }
}

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly provider?: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'APIError';
  }

  get isServerError(): boolean {
    return this.statusCode !== undefined && this.statusCode >= 500;
  }
}

/** Error names a stage records as recoverable. */
export const RECOVERABLE_ERROR_NAMES: readonly string[] = [
  'RateLimitError',
  'TimeoutError',
  'ConnectionError',
  'APIError',
];

export function isRecoverableError(error: unknown): boolean {
  return error instanceof Error && RECOVERABLE_ERROR_NAMES.includes(error.name);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'UnknownError';
}
