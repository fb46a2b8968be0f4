/**
 * Resilient HTTP Client
 *
 * Executes one logical request against a session with retries. Each attempt
 * yields an `AttemptOutcome`; the retry loop switches on it and only throws
 * once the request has definitely failed:
 *
 *   ATTEMPT -> SUCCESS
 *           -> RATE_LIMITED -> ATTEMPT | FAIL
 *           -> AUTH_FAILED  -> ATTEMPT | FAIL
 *           -> RETRYABLE    -> ATTEMPT | FAIL
 *           -> FATAL        -> FAIL
 *
 * FAIL raises AuthenticationError, RetryExceededError, SSLVerificationError
 * or UnknownError. Non-retried 404s are successes.
 *
 * @module http
 */

import { BackoffStrategy, parseRetryAfter } from '../automation/BackoffStrategy.js';
import { BackoffTimer, type SleepFn } from '../automation/runtime/BackoffTimer.js';
import type { EngineLogger } from '../core/EngineLogger.js';
import {
  AuthenticationError,
  PlaybookError,
  RateLimitError,
  RetryableError,
  RetryExceededError,
  SSLVerificationError,
  UnknownError,
  errorMessage,
} from '../errors/index.js';
import type { Session } from '../session/Session.js';
import type { RetryConfig } from '../types/core-types.js';
import type { CircuitBreaker } from './CircuitBreaker.js';
import { createFetchTransport } from './FetchTransport.js';
import { HttpRequestBuilder, joinUrl, type HttpRequestSpec } from './HttpRequestBuilder.js';
import { HttpResponse } from './HttpResponse.js';
import { TransportError, type HttpTransport, type TransportFactory, type TransportRequest } from './HttpTransport.js';

const RETRYABLE_STATUS_CODES = new Set([500, 502, 503, 504]);

export enum AttemptOutcome {
  Success = 'success',
  RetryableFailure = 'retryable-failure',
  RateLimited = 'rate-limited',
  AuthFailed = 'auth-failed',
  Fatal = 'fatal',
}

export type AttemptResult =
  | { outcome: AttemptOutcome.Success; response: HttpResponse }
  | { outcome: AttemptOutcome.RateLimited; error: RateLimitError }
  | { outcome: AttemptOutcome.AuthFailed; statusCode: number }
  | { outcome: AttemptOutcome.RetryableFailure; error: RetryableError; breakerFailure: boolean }
  | { outcome: AttemptOutcome.Fatal; error: PlaybookError };

/**
 * Metadata for the most recent call. Only the current call is kept.
 */
export interface RequestMetadata {
  method: string;
  url: string;
  startedAt: Date;
  endedAt?: Date;
  durationMs?: number;
  attempts: number;
  retryCount: number;
  statusCode?: number;
  success: boolean;
  errors: string[];
  requestSizeBytes: number;
  responseSizeBytes: number;
}

export interface ResilientHttpClientConfig {
  retry: RetryConfig;
  validateSsl: boolean;
  /** Seconds */
  timeout: number;
}

export interface ResilientHttpClientOptions {
  logger: EngineLogger;
  circuitBreaker?: CircuitBreaker;
  transportFactory?: TransportFactory;
  sleep?: SleepFn;
  /** Clock for HTTP-date Retry-After values */
  now?: () => number;
}

export class ResilientHttpClient {
  private readonly logger: EngineLogger;
  private readonly circuitBreaker?: CircuitBreaker;
  private readonly transportFactory: TransportFactory;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly backoff: BackoffStrategy;
  private activeTransport: HttpTransport | undefined;
  private lastMetadata: RequestMetadata | undefined;

  constructor(
    private readonly session: Session,
    private readonly config: ResilientHttpClientConfig,
    options: ResilientHttpClientOptions
  ) {
    this.logger = options.logger;
    this.circuitBreaker = options.circuitBreaker;
    this.transportFactory = options.transportFactory ?? createFetchTransport;
    this.sleep = options.sleep ?? BackoffTimer.sleep;
    this.now = options.now ?? Date.now;
    this.backoff = BackoffStrategy.fromRetryConfig(config.retry);
  }

  get metadata(): RequestMetadata | undefined {
    return this.lastMetadata;
  }

  async executeRequest(spec: HttpRequestSpec): Promise<HttpResponse> {
    const maxAttempts = this.config.retry.maxRetries + 1;
    const url = joinUrl(this.session.baseUrl, spec.endpoint);
    const context = { method: spec.method, url };
    const metadata: RequestMetadata = {
      method: spec.method,
      url,
      startedAt: new Date(),
      attempts: 0,
      retryCount: 0,
      success: false,
      errors: [],
      requestSizeBytes: 0,
      responseSizeBytes: 0,
    };
    this.lastMetadata = metadata;

    const transport = this.transportFactory({
      validateSsl: this.config.validateSsl,
      timeoutMs: this.config.timeout * 1000,
    });
    this.activeTransport = transport;

    try {
      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        metadata.attempts = attempt + 1;
        const isLastAttempt = attempt === maxAttempts - 1;

        await this.waitForCircuitBreaker(url);
        const result = await this.attempt(transport, spec, metadata, attempt);

        switch (result.outcome) {
          case AttemptOutcome.Success:
            this.circuitBreaker?.recordSuccess();
            metadata.success = true;
            return result.response;

          case AttemptOutcome.RateLimited: {
            metadata.errors.push(result.error.message);
            if (isLastAttempt) {
              throw new RetryExceededError(maxAttempts, result.error, { ...context, statusCode: 429 });
            }
            const delayMs = result.error.retryAfterMs ?? this.backoff.calculateDelay(attempt);
            this.logger.warn(`Rate limited, retrying in ${BackoffTimer.formatDelay(delayMs)}`, {
              ...context,
              attempt: attempt + 1,
              serverDirected: result.error.retryAfterMs !== undefined,
            });
            await this.sleep(delayMs);
            break;
          }

          case AttemptOutcome.AuthFailed:
            metadata.errors.push(`HTTP ${result.statusCode}: authentication rejected`);
            if (isLastAttempt) {
              throw new AuthenticationError(
                `Authentication rejected with HTTP ${result.statusCode} after ${maxAttempts} attempts`,
                { ...context, statusCode: result.statusCode }
              );
            }
            await this.reauthenticate(url);
            break;

          case AttemptOutcome.RetryableFailure: {
            metadata.errors.push(result.error.message);
            if (result.breakerFailure) {
              this.circuitBreaker?.recordFailure();
            }
            if (isLastAttempt) {
              throw new RetryExceededError(maxAttempts, result.error, context);
            }
            const delayMs = this.backoff.calculateDelay(attempt);
            this.logger.warn(`${result.error.message}, retrying in ${BackoffTimer.formatDelay(delayMs)}`, {
              ...context,
              attempt: attempt + 1,
              maxAttempts,
            });
            await this.sleep(delayMs);
            break;
          }

          case AttemptOutcome.Fatal:
            metadata.errors.push(result.error.message);
            throw result.error;
        }
      }

      throw new UnknownError('Retry loop ended without an outcome', context);
    } catch (error) {
      this.logger.error(`Request failed: ${spec.method} ${url}`, error instanceof Error ? error : undefined, {
        attempts: metadata.attempts,
      });
      throw error;
    } finally {
      metadata.endedAt = new Date();
      metadata.durationMs = metadata.endedAt.getTime() - metadata.startedAt.getTime();
      metadata.retryCount = Math.max(0, metadata.attempts - 1);
      this.activeTransport = undefined;
      await transport.close();
    }
  }

  /**
   * Release a transport still held by an interrupted call
   */
  async close(): Promise<void> {
    const transport = this.activeTransport;
    this.activeTransport = undefined;
    if (transport) {
      await transport.close();
    }
  }

  private async attempt(
    transport: HttpTransport,
    spec: HttpRequestSpec,
    metadata: RequestMetadata,
    attempt: number
  ): Promise<AttemptResult> {
    const context = { method: spec.method, url: metadata.url, attempt: attempt + 1 };

    if (!this.session.isAuthenticated()) {
      try {
        await this.session.authenticate();
      } catch (error) {
        return {
          outcome: AttemptOutcome.Fatal,
          error: error instanceof AuthenticationError
            ? error
            : new AuthenticationError(`Authentication failed: ${errorMessage(error)}`, context, error),
        };
      }
    }

    const request = this.buildRequest(spec);
    metadata.requestSizeBytes = request.body ? Buffer.byteLength(request.body, 'utf-8') : 0;
    this.logger.debug(`${request.method} ${request.url}`, { attempt: attempt + 1 });

    let response: HttpResponse;
    try {
      response = new HttpResponse(await transport.send(request));
    } catch (error) {
      return this.classifyError(error, context);
    }

    metadata.statusCode = response.status;
    metadata.responseSizeBytes = response.sizeBytes;
    return this.classifyResponse(response, context);
  }

  private buildRequest(spec: HttpRequestSpec): TransportRequest {
    const builder = new HttpRequestBuilder()
      .method(spec.method)
      .url(this.session.baseUrl, spec.endpoint)
      .headers(this.session.getHeaders())
      .headers(spec.headers ?? {});

    if (spec.json !== undefined) {
      builder.json(spec.json);
    }
    if (spec.params) {
      builder.query(spec.params);
    }
    return builder.build();
  }

  private classifyResponse(
    response: HttpResponse,
    context: { method: string; url: string; attempt: number }
  ): AttemptResult {
    const status = response.status;
    const rateLimit = this.config.retry.rateLimit;

    if (status === 429) {
      const retryAfterMs = rateLimit.useServerRetryDelay
        ? parseRetryAfter(response.header(rateLimit.retryHeader), this.now())
        : undefined;
      return {
        outcome: AttemptOutcome.RateLimited,
        error: new RateLimitError('HTTP 429: rate limited', { ...context, statusCode: status, retryAfterMs }),
      };
    }

    if (status === 401 || status === 403) {
      return { outcome: AttemptOutcome.AuthFailed, statusCode: status };
    }

    if (RETRYABLE_STATUS_CODES.has(status)) {
      return {
        outcome: AttemptOutcome.RetryableFailure,
        error: new RetryableError(`HTTP ${status}: ${response.statusText || 'server error'}`, { ...context, statusCode: status }),
        breakerFailure: true,
      };
    }

    if (status === 404 && this.config.retry.retryOn404) {
      return {
        outcome: AttemptOutcome.RetryableFailure,
        error: new RetryableError('HTTP 404: not found', { ...context, statusCode: status }),
        breakerFailure: false,
      };
    }

    return { outcome: AttemptOutcome.Success, response };
  }

  private classifyError(
    error: unknown,
    context: { method: string; url: string; attempt: number }
  ): AttemptResult {
    if (!(error instanceof TransportError)) {
      return {
        outcome: AttemptOutcome.Fatal,
        error: new UnknownError(`Unexpected transport failure: ${errorMessage(error)}`, context, error),
      };
    }

    switch (error.kind) {
      case 'ssl':
        return {
          outcome: AttemptOutcome.Fatal,
          error: new SSLVerificationError(`SSL verification failed: ${error.message}`, context, error),
        };
      case 'invalid-url':
        return {
          outcome: AttemptOutcome.Fatal,
          error: new UnknownError(error.message, context, error),
        };
      case 'connection':
      case 'timeout':
        return {
          outcome: AttemptOutcome.RetryableFailure,
          error: new RetryableError(`Connection error: ${error.message}`, context, error),
          breakerFailure: true,
        };
      case 'client':
        return {
          outcome: AttemptOutcome.RetryableFailure,
          error: new RetryableError(`Client error: ${error.message}`, context, error),
          breakerFailure: false,
        };
    }
  }

  private async waitForCircuitBreaker(url: string): Promise<void> {
    const breaker = this.circuitBreaker;
    if (!breaker || !breaker.isOpen()) {
      return;
    }
    const waitMs = breaker.getResetTimeout();
    this.logger.warn(`Circuit breaker open, waiting ${BackoffTimer.formatDelay(waitMs)}`, { url });
    await this.sleep(waitMs);
  }

  /**
   * Refresh first; fall back to a full authentication
   */
  private async reauthenticate(url: string): Promise<void> {
    let refreshed = false;
    try {
      await this.session.refreshAuth();
      refreshed = true;
    } catch (error) {
      this.logger.warn(`Token refresh failed: ${errorMessage(error)}`, { url });
    }
    // A failed refresh may leave the rejected token in place
    if (refreshed && this.session.isAuthenticated()) {
      return;
    }

    try {
      await this.session.authenticate();
    } catch (error) {
      throw error instanceof AuthenticationError
        ? error
        : new AuthenticationError(`Re-authentication failed: ${errorMessage(error)}`, { url }, error);
    }
    if (!this.session.isAuthenticated()) {
      throw new AuthenticationError('Re-authentication did not produce valid credentials', { url });
    }
  }
}
