/**
 * Core playbook types.
 *
 * These are the validated, camelCased shapes the engine works with. The
 * YAML/JSON documents use snake_case keys; `parser/PlaybookSchema.ts` maps
 * one onto the other and fills defaults. Every config value is read-only
 * after load.
 *
 * @module types
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** The run-scoped variable store contents */
export type Variables = Record<string, JsonValue>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/** What happens when a step fails */
export type OnErrorPolicy = 'ignore' | 'abort';

export interface RateLimitConfig {
  /** Honor the server's retry header on 429 */
  readonly useServerRetryDelay: boolean;
  readonly retryHeader: string;
}

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the breaker */
  readonly threshold: number;
  /** Seconds the breaker stays open */
  readonly reset: number;
  /** Upper bound in seconds of the random extra added to `reset` */
  readonly jitter: number;
}

export interface RetryConfig {
  readonly maxRetries: number;
  /** Seconds; delay = backoffFactor * 2^attempt */
  readonly backoffFactor: number;
  /** Seconds */
  readonly maxDelay: number;
  readonly retryOn404: boolean;
  readonly circuitBreaker?: CircuitBreakerConfig;
  readonly rateLimit: RateLimitConfig;
}

export interface RequestConfig {
  readonly method: HttpMethod;
  readonly endpoint: string;
  readonly data?: JsonValue;
  readonly fromFile?: string;
  readonly params?: Readonly<Record<string, JsonPrimitive>>;
  readonly headers?: Readonly<Record<string, string>>;
}

export interface StoreConfig {
  /** Target variable name (templated) */
  readonly var: string;
  /** JSONata expression (templated); absent means the whole body */
  readonly query?: string;
  readonly append: boolean;
}

export interface StepConfig {
  readonly name?: string;
  readonly session: string;
  /** `"item in collection"` */
  readonly iterate?: string;
  /** Applies to iteration fan-out */
  readonly parallel: boolean;
  readonly request: RequestConfig;
  readonly store: readonly StoreConfig[];
  readonly retry?: RetryConfig;
  readonly onError: OnErrorPolicy;
  /** Seconds */
  readonly timeout?: number;
  readonly validateSsl?: boolean;
}

export interface PhaseConfig {
  readonly name: string;
  readonly description?: string;
  readonly parallel: boolean;
  readonly steps: readonly StepConfig[];
}

export interface AuthConfig {
  readonly type: string;
  /** Everything besides `type`, templated before use */
  readonly options: Readonly<Record<string, JsonValue>>;
}

export interface SessionConfig {
  readonly baseUrl: string;
  readonly auth?: AuthConfig;
  readonly headers: Readonly<Record<string, string>>;
  readonly retry?: RetryConfig;
  readonly circuitBreaker?: CircuitBreakerConfig;
  readonly validateSsl: boolean;
  /** Seconds */
  readonly timeout: number;
}

export type CheckpointStoreType = 'file' | 'remote';

export interface IncrementalConfig {
  readonly enabled: boolean;
  readonly store: CheckpointStoreType;
  /** Directory for the file store */
  readonly filePath?: string;
  /** Session and endpoint for the remote store */
  readonly session?: string;
  readonly endpoint?: string;
}

export type MetricsCollector = 'console' | 'json';

export interface MetricsConfig {
  readonly enabled: boolean;
  readonly collector: MetricsCollector;
  readonly outputFile?: string;
}

export interface PlaybookConfig {
  readonly name?: string;
  readonly description?: string;
  readonly sessions: Readonly<Record<string, SessionConfig>>;
  readonly phases: readonly PhaseConfig[];
  readonly incremental: IncrementalConfig;
  readonly metrics: MetricsConfig;
  /** Seconds granted to in-flight work on shutdown */
  readonly shutdownTimeout: number;
}

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  useServerRetryDelay: true,
  retryHeader: 'Retry-After',
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  backoffFactor: 1,
  maxDelay: 60,
  retryOn404: false,
  rateLimit: DEFAULT_RATE_LIMIT_CONFIG,
};

/** Seconds */
export const DEFAULT_SESSION_TIMEOUT = 30;
export const DEFAULT_SHUTDOWN_TIMEOUT = 10;
