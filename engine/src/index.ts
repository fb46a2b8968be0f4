/**
 * Restplay Engine - declarative multi-phase HTTP playbooks
 *
 * @example
 * ```ts
 * import { PlaybookExecutionEngine, PlaybookLoader, StaticSessionProvider } from '@restplay/engine';
 *
 * const playbook = await PlaybookLoader.fromFile('./playbook.yaml');
 * const sessions = StaticSessionProvider.fromConfigs({ api: sessionConfig('https://api.example.test') });
 * await new PlaybookExecutionEngine().execute(playbook, sessions);
 * ```
 */

// ============================================================================
// PRIMARY EXPORTS
// ============================================================================

export { PlaybookExecutionEngine } from './execution/PlaybookExecutionEngine.js';
export type { PlaybookEngineOptions, PlaybookRunResult } from './execution/PlaybookExecutionEngine.js';
export { PlaybookLoader } from './loader/PlaybookLoader.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export * from './types/core-types.js';
export { SchemaValidator } from './parser/SchemaValidator.js';
export {
  ITERATE_PATTERN,
  PlaybookSchema,
  SessionSchema,
  type PlaybookDocument,
} from './parser/PlaybookSchema.js';

// ============================================================================
// SESSIONS & HTTP
// ============================================================================

export {
  ConfiguredSession,
  NoAuthenticator,
  StaticSessionProvider,
  sessionConfig,
  type Authenticator,
  type AuthenticatorFactory,
  type ConfiguredSessionOptions,
  type Session,
  type SessionProvider,
} from './session/Session.js';
export {
  ApiKeyAuthenticator,
  BasicAuthenticator,
  BearerAuthenticator,
  OAuth2Authenticator,
  createAuthenticators,
  type BuiltInAuthenticatorOptions,
  type OAuth2Options,
} from './session/authenticators.js';
export { SessionManager } from './session/SessionManager.js';
export {
  AttemptOutcome,
  ResilientHttpClient,
  type AttemptResult,
  type RequestMetadata,
  type ResilientHttpClientConfig,
  type ResilientHttpClientOptions,
} from './http/ResilientHttpClient.js';
export { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from './http/CircuitBreaker.js';
export { FetchTransport, createFetchTransport } from './http/FetchTransport.js';
export { HttpRequestBuilder, joinUrl, type HttpRequestSpec } from './http/HttpRequestBuilder.js';
export { HttpResponse } from './http/HttpResponse.js';
export {
  TransportError,
  type HttpTransport,
  type TransportErrorKind,
  type TransportFactory,
  type TransportOptions,
  type TransportRequest,
  type TransportResponse,
} from './http/HttpTransport.js';
export { BackoffStrategy, parseRetryAfter, type BackoffConfig } from './automation/BackoffStrategy.js';
export { BackoffTimer, type SleepFn } from './automation/runtime/BackoffTimer.js';

// ============================================================================
// VARIABLES & TEMPLATES
// ============================================================================

export { VariableManager } from './context/VariableManager.js';
export { TemplateRenderer, type TemplateContext, type TemplateRendererOptions } from './context/TemplateRenderer.js';
export { ConfigRenderer, type ConfigRendererOptions } from './context/ConfigRenderer.js';

// ============================================================================
// CHECKPOINTS
// ============================================================================

export {
  CheckpointManager,
  shouldRestartParallelPhase,
  shouldSkipPhase,
  shouldSkipStep,
  type CheckpointPosition,
} from './checkpoint/CheckpointManager.js';
export type { CheckpointData, CheckpointStore } from './checkpoint/CheckpointStore.js';
export { FileCheckpointStore } from './checkpoint/FileCheckpointStore.js';
export { RemoteCheckpointStore, type RemoteCheckpointStoreOptions } from './checkpoint/RemoteCheckpointStore.js';
export { createCheckpointStore } from './checkpoint/createCheckpointStore.js';

// ============================================================================
// EVENTS & OBSERVERS
// ============================================================================

export * from './events/ExecutionEvents.js';
export { ObserverManager, type ExecutionObserver } from './events/ObserverManager.js';
export { MetricsObserver, type MetricsReport, type RequestStats } from './events/MetricsObserver.js';

// ============================================================================
// LOGGING, ERRORS & LIFECYCLE
// ============================================================================

export { EngineLogger, createEngineLogger, createSilentLogger, type EngineLoggerConfig } from './core/EngineLogger.js';
export * from './types/log-types.js';
export * from './errors/index.js';
export { ShutdownManager, type ShutdownHandler, type ShutdownReport } from './lifecycle/ShutdownManager.js';

// ============================================================================
// SCHEDULING
// ============================================================================

export {
  CronScheduler,
  type CronExecution,
  type CronExecutionStatus,
  type CronSchedulerListeners,
  type CronSchedulerOptions,
  type CronTask,
  type CronTaskFactory,
} from './scheduling/CronScheduler.js';
