/**
 * Playbook Schema
 *
 * Zod schemas for the playbook document. Input keys are snake_case as
 * written in YAML; output values are the camelCase types from
 * `types/core-types.ts` with defaults filled in.
 *
 * @module parser
 */

import { z } from 'zod';
import {
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_SESSION_TIMEOUT,
  DEFAULT_SHUTDOWN_TIMEOUT,
  type AuthConfig,
  type CircuitBreakerConfig,
  type IncrementalConfig,
  type JsonValue,
  type MetricsConfig,
  type PhaseConfig,
  type PlaybookConfig,
  type RateLimitConfig,
  type RequestConfig,
  type RetryConfig,
  type SessionConfig,
  type StepConfig,
  type StoreConfig,
} from '../types/core-types.js';

/** `<item> in <collection>` */
export const ITERATE_PATTERN = /^\s*([A-Za-z_]\w*)\s+in\s+([A-Za-z_]\w*)\s*$/;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const seconds = z.number().nonnegative();

/**
 * A breaker has to be able to open within the retries of one request
 *
 * @returns The violation, or undefined when the pair is consistent
 */
export function breakerThresholdIssue(
  breaker: CircuitBreakerConfig | undefined,
  maxRetries: number
): string | undefined {
  if (breaker === undefined || breaker.threshold <= maxRetries) {
    return undefined;
  }
  return `circuit breaker threshold (${breaker.threshold}) must not exceed max_retries (${maxRetries})`;
}

export const RateLimitSchema = z
  .object({
    use_server_retry_delay: z.boolean().default(DEFAULT_RATE_LIMIT_CONFIG.useServerRetryDelay),
    retry_header: z.string().min(1).default(DEFAULT_RATE_LIMIT_CONFIG.retryHeader),
  })
  .strict()
  .transform((raw): RateLimitConfig => ({
    useServerRetryDelay: raw.use_server_retry_delay,
    retryHeader: raw.retry_header,
  }));

export const CircuitBreakerSchema = z
  .object({
    threshold: z.number().int().positive(),
    reset: seconds,
    jitter: seconds.default(0),
  })
  .strict()
  .transform((raw): CircuitBreakerConfig => ({ ...raw }));

export const RetrySchema = z
  .object({
    max_retries: z.number().int().nonnegative().default(3),
    backoff_factor: seconds.default(1),
    max_delay: seconds.default(60),
    retry_on_404: z.boolean().default(false),
    circuit_breaker: CircuitBreakerSchema.optional(),
    rate_limit: RateLimitSchema.optional(),
  })
  .strict()
  .superRefine((raw, ctx) => {
    const message = breakerThresholdIssue(raw.circuit_breaker, raw.max_retries);
    if (message) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['circuit_breaker', 'threshold'], message });
    }
  })
  .transform((raw): RetryConfig => ({
    maxRetries: raw.max_retries,
    backoffFactor: raw.backoff_factor,
    maxDelay: raw.max_delay,
    retryOn404: raw.retry_on_404,
    circuitBreaker: raw.circuit_breaker,
    rateLimit: raw.rate_limit ?? DEFAULT_RATE_LIMIT_CONFIG,
  }));

export const RequestSchema = z
  .object({
    method: z
      .string()
      .transform((method) => method.toUpperCase())
      .pipe(z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS']))
      .default('GET'),
    endpoint: z.string(),
    data: JsonValueSchema.optional(),
    fromFile: z.string().min(1).optional(),
    params: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
    headers: z.record(z.string()).optional(),
  })
  .strict()
  .superRefine((raw, ctx) => {
    if (raw.data !== undefined && raw.fromFile !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fromFile'],
        message: 'data and fromFile are mutually exclusive',
      });
    }
  })
  .transform((raw): RequestConfig => ({ ...raw }));

export const StoreSchema = z
  .object({
    var: z.string().min(1),
    query: z.string().min(1).optional(),
    append: z.boolean().default(false),
  })
  .strict()
  .transform((raw): StoreConfig => ({ ...raw }));

export const StepSchema = z
  .object({
    name: z.string().optional(),
    session: z.string().min(1),
    iterate: z.string().regex(ITERATE_PATTERN, 'iterate must look like "item in collection"').optional(),
    parallel: z.boolean().default(false),
    request: RequestSchema,
    store: z.array(StoreSchema).default([]),
    retry: RetrySchema.optional(),
    on_error: z.enum(['ignore', 'abort']).default('abort'),
    timeout: z.number().positive().optional(),
    validate_ssl: z.boolean().optional(),
  })
  .strict()
  .transform((raw): StepConfig => ({
    name: raw.name,
    session: raw.session,
    iterate: raw.iterate,
    parallel: raw.parallel,
    request: raw.request,
    store: raw.store,
    retry: raw.retry,
    onError: raw.on_error,
    timeout: raw.timeout,
    validateSsl: raw.validate_ssl,
  }));

export const PhaseSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    parallel: z.boolean().default(false),
    steps: z.array(StepSchema).min(1, 'a phase needs at least one step'),
  })
  .strict()
  .transform((raw): PhaseConfig => ({ ...raw }));

export const AuthSchema = z
  .object({ type: z.string().min(1) })
  .catchall(JsonValueSchema)
  .transform((raw): AuthConfig => {
    const { type, ...options } = raw;
    return { type, options };
  });

export const SessionSchema = z
  .object({
    base_url: z.string().min(1),
    auth: AuthSchema.optional(),
    headers: z.record(z.string()).default({}),
    retry: RetrySchema.optional(),
    circuit_breaker: CircuitBreakerSchema.optional(),
    validate_ssl: z.boolean().default(true),
    timeout: z.number().positive().default(DEFAULT_SESSION_TIMEOUT),
  })
  .strict()
  .superRefine((raw, ctx) => {
    // Requests without their own retry block fall back to the session's, then to the default
    const message = breakerThresholdIssue(raw.circuit_breaker, raw.retry?.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries);
    if (message) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['circuit_breaker', 'threshold'], message });
    }
  })
  .transform((raw): SessionConfig => ({
    baseUrl: raw.base_url,
    auth: raw.auth,
    headers: raw.headers,
    retry: raw.retry,
    circuitBreaker: raw.circuit_breaker,
    validateSsl: raw.validate_ssl,
    timeout: raw.timeout,
  }));

export const IncrementalSchema = z
  .object({
    enabled: z.boolean().default(false),
    store: z.enum(['file', 'remote']).default('file'),
    file_path: z.string().min(1).optional(),
    session: z.string().min(1).optional(),
    endpoint: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((raw, ctx) => {
    if (!raw.enabled) return;
    if (raw.store === 'file' && !raw.file_path) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['file_path'], message: 'file store requires file_path' });
    }
    if (raw.store === 'remote') {
      if (!raw.session) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['session'], message: 'remote store requires session' });
      }
      if (!raw.endpoint) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['endpoint'], message: 'remote store requires endpoint' });
      }
    }
  })
  .transform((raw): IncrementalConfig => ({
    enabled: raw.enabled,
    store: raw.store,
    filePath: raw.file_path,
    session: raw.session,
    endpoint: raw.endpoint,
  }));

export const MetricsSchema = z
  .object({
    enabled: z.boolean().default(false),
    collector: z.enum(['console', 'json']).default('console'),
    output_file: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((raw, ctx) => {
    if (raw.enabled && raw.collector === 'json' && !raw.output_file) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['output_file'], message: 'json collector requires output_file' });
    }
  })
  .transform((raw): MetricsConfig => ({
    enabled: raw.enabled,
    collector: raw.collector,
    outputFile: raw.output_file,
  }));

export const PlaybookSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    sessions: z.record(SessionSchema).default({}),
    phases: z.array(PhaseSchema).min(1, 'a playbook needs at least one phase'),
    incremental: IncrementalSchema.default({}),
    metrics: MetricsSchema.default({}),
    shutdown_timeout: seconds.default(DEFAULT_SHUTDOWN_TIMEOUT),
  })
  .strict()
  .superRefine((raw, ctx) => {
    const seen = new Set<string>();
    raw.phases.forEach((phase, index) => {
      if (seen.has(phase.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['phases', index, 'name'],
          message: `duplicate phase name "${phase.name}"`,
        });
      }
      seen.add(phase.name);
    });

    raw.phases.forEach((phase, phaseIndex) => {
      phase.steps.forEach((step, stepIndex) => {
        const session = raw.sessions[step.session];
        if (!step.retry || step.retry.circuitBreaker || !session) return;
        const message = breakerThresholdIssue(
          session.circuitBreaker ?? session.retry?.circuitBreaker,
          step.retry.maxRetries
        );
        if (message) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['phases', phaseIndex, 'steps', stepIndex, 'retry', 'max_retries'],
            message: `session "${step.session}": ${message}`,
          });
        }
      });
    });
  })
  .transform((raw): PlaybookConfig => ({
    name: raw.name,
    description: raw.description,
    sessions: raw.sessions,
    phases: raw.phases,
    incremental: raw.incremental,
    metrics: raw.metrics,
    shutdownTimeout: raw.shutdown_timeout,
  }));

/** The document shape before defaults and renaming */
export type PlaybookDocument = z.input<typeof PlaybookSchema>;
