/**
 * HTTP Errors
 *
 * The resilient client only throws AuthenticationError, RetryExceededError,
 * SSLVerificationError and UnknownError. RateLimitError and RetryableError
 * describe the failed attempts that led there and are kept as the
 * `lastError` of a RetryExceededError.
 *
 * @module errors
 */

import { PlaybookError } from './PlaybookError.js';
import { PlaybookErrorCode } from './ErrorCodes.js';

interface HttpErrorContext {
  url?: string;
  method?: string;
  statusCode?: number;
  attempt?: number;
}

export class AuthenticationError extends PlaybookError {
  constructor(message: string, context: HttpErrorContext = {}, cause?: unknown) {
    super({
      code: PlaybookErrorCode.HTTP_AUTHENTICATION_FAILED,
      message,
      context: { ...context },
      cause,
    });
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends PlaybookError {
  /** Server-directed delay, when the response carried one */
  public readonly retryAfterMs?: number;

  constructor(message: string, context: HttpErrorContext & { retryAfterMs?: number } = {}) {
    super({
      code: PlaybookErrorCode.HTTP_RATE_LIMITED,
      message,
      context: { ...context },
    });
    this.name = 'RateLimitError';
    this.retryAfterMs = context.retryAfterMs;
  }
}

export class RetryableError extends PlaybookError {
  constructor(message: string, context: HttpErrorContext = {}, cause?: unknown) {
    super({
      code: PlaybookErrorCode.HTTP_RETRYABLE,
      message,
      context: { ...context },
      cause,
    });
    this.name = 'RetryableError';
  }
}

export class SSLVerificationError extends PlaybookError {
  constructor(message: string, context: HttpErrorContext = {}, cause?: unknown) {
    super({
      code: PlaybookErrorCode.HTTP_SSL_VERIFICATION,
      message,
      context: { ...context },
      cause,
    });
    this.name = 'SSLVerificationError';
  }
}

export class RetryExceededError extends PlaybookError {
  public readonly attempts: number;
  public readonly lastError?: PlaybookError;

  constructor(attempts: number, lastError?: PlaybookError, context: HttpErrorContext = {}) {
    super({
      code: PlaybookErrorCode.HTTP_RETRY_EXCEEDED,
      message: `Request failed after ${attempts} attempt${attempts === 1 ? '' : 's'}` +
        (lastError ? `: ${lastError.message}` : ''),
      context: { ...context, attempts },
      cause: lastError,
    });
    this.name = 'RetryExceededError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class UnknownError extends PlaybookError {
  constructor(message: string, context: HttpErrorContext = {}, cause?: unknown) {
    super({
      code: PlaybookErrorCode.HTTP_UNKNOWN,
      message,
      context: { ...context },
      cause,
    });
    this.name = 'UnknownError';
  }
}
