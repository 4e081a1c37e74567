// packages/core/src/models/upstream-errors.ts -- Maps provider SDK failures onto the pipeline's error classes

import { HTTP_TOO_MANY_REQUESTS } from '../utils/constants.js';
import {
  ApiError,
  ConnectionError,
  RateLimitError,
  TimeoutError,
  isRecoverableError,
} from '../utils/errors.js';

const TIMEOUT_MARKERS = ['ETIMEDOUT', 'DEADLINE_EXCEEDED', 'timed out', 'timeout'];
const CONNECTION_MARKERS = ['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'fetch failed'];

/** HTTP status carried by an SDK error, if any. */
export function getStatusCode(error: unknown): number | undefined {
  if (error && typeof error === 'object') {
    if ('status' in error && typeof error.status === 'number') return error.status;
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
    if (
      'response' in error &&
      error.response &&
      typeof error.response === 'object' &&
      'status' in error.response &&
      typeof error.response.status === 'number'
    ) {
      return error.response.status;
    }
  }
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isRateLimit(error: unknown): boolean {
  return getStatusCode(error) === HTTP_TOO_MANY_REQUESTS;
}

/**
 * Translate an SDK error. The message is preserved verbatim so callers can
 * still match on provider text (billing notices, for one).
 */
export function toUpstreamError(error: unknown, provider: string): Error {
  if (isRecoverableError(error) && error instanceof Error) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const status = getStatusCode(error);
  const code = errorCode(error);

  if (status === HTTP_TOO_MANY_REQUESTS) {
    return new RateLimitError(message, provider);
  }
  if (status === 408 || status === 504 || TIMEOUT_MARKERS.some((m) => message.includes(m))) {
    return new TimeoutError(message);
  }
  if (
    (code !== undefined && CONNECTION_MARKERS.includes(code)) ||
    CONNECTION_MARKERS.some((m) => message.includes(m))
  ) {
    return new ConnectionError(message, code);
  }
  if (status !== undefined) {
    return new ApiError(message, provider, status);
  }
  return error instanceof Error ? error : new Error(message);
}
