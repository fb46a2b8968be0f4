/**
 * Step Executor
 *
 * Runs one step: optional iteration over a collection variable, one HTTP
 * request per item, extraction of response data into variables, and the
 * step's `on_error` policy. Step configs are never modified; every request
 * renders a fresh value from the config and the current variables.
 *
 * @module execution
 */

import type { SleepFn } from '../automation/runtime/BackoffTimer.js';
import type { ConfigRenderer } from '../context/ConfigRenderer.js';
import type { TemplateContext } from '../context/TemplateRenderer.js';
import type { VariableManager } from '../context/VariableManager.js';
import type { EngineLogger } from '../core/EngineLogger.js';
import { ConfigurationError, ExecutionCancelledError, errorMessage, toError } from '../errors/index.js';
import { ExecutionEventType } from '../events/ExecutionEvents.js';
import type { ObserverManager } from '../events/ObserverManager.js';
import { CircuitBreaker } from '../http/CircuitBreaker.js';
import type { TransportFactory } from '../http/HttpTransport.js';
import { ResilientHttpClient } from '../http/ResilientHttpClient.js';
import { ITERATE_PATTERN, breakerThresholdIssue } from '../parser/PlaybookSchema.js';
import type { SessionProvider } from '../session/Session.js';
import { DEFAULT_RETRY_CONFIG, type JsonValue, type StepConfig } from '../types/core-types.js';
import {
  createStepContext,
  generateExecutionId,
  type PhaseContext,
  type StepContext,
} from './ExecutionContext.js';

export interface StepExecutorDependencies {
  variables: VariableManager;
  configRenderer: ConfigRenderer;
  sessions: SessionProvider;
  observers: ObserverManager;
  logger: EngineLogger;
  transportFactory?: TransportFactory;
  sleep?: SleepFn;
  /** Reason the run is stopping, if it is */
  stopReason: () => string | undefined;
}

export class StepExecutor {
  constructor(private readonly deps: StepExecutorDependencies) {}

  /**
   * Run a step and apply its error policy. Resolves when the step succeeded
   * or failed under `on_error: ignore`; rejects otherwise.
   */
  async execute(phase: PhaseContext, index: number, step: StepConfig): Promise<void> {
    const ctx = createStepContext(phase, index, step);
    const { observers, logger } = this.deps;

    observers.notify({
      type: ExecutionEventType.STEP_START,
      timestamp: new Date(),
      runId: phase.runId,
      phaseId: phase.id,
      stepId: ctx.id,
      stepIndex: index,
      stepName: ctx.name,
      session: step.session,
    });

    let failure: unknown;
    let failed = false;
    try {
      if (step.iterate !== undefined) {
        failed = (await this.runIterations(ctx, step.iterate)) > 0;
      } else {
        await this.executeRequest(ctx, {});
      }
    } catch (error) {
      failure = error;
      failed = true;
    }

    observers.notify({
      type: ExecutionEventType.STEP_END,
      timestamp: new Date(),
      runId: phase.runId,
      phaseId: phase.id,
      stepId: ctx.id,
      stepIndex: index,
      stepName: ctx.name,
      success: !failed,
      retryCount: ctx.retryCount,
      storedVars: ctx.storedVars,
      durationMs: Date.now() - ctx.startedAt,
      error: failure !== undefined ? errorMessage(failure) : undefined,
    });

    if (failure === undefined) {
      return;
    }
    if (step.onError === 'ignore' && !(failure instanceof ExecutionCancelledError)) {
      logger.warn(`Step "${ctx.name}" failed, continuing (on_error: ignore): ${errorMessage(failure)}`);
      return;
    }
    throw failure;
  }

  /**
   * @returns Number of failed iterations that did not abort the step
   */
  private async runIterations(ctx: StepContext, expression: string): Promise<number> {
    const match = ITERATE_PATTERN.exec(expression);
    if (!match) {
      throw ConfigurationError.invalidIteration(expression, 'expected "item in collection"');
    }
    const [, itemName, collectionName] = match;
    const items = this.resolveCollection(expression, collectionName);
    const scopeFor = (position: number): TemplateContext => ({
      [itemName]: items[position],
      [`${itemName}_index`]: position,
    });

    this.deps.logger.debug(`Step "${ctx.name}" iterating ${items.length} item(s)`, {
      parallel: ctx.config.parallel,
    });

    if (ctx.config.parallel) {
      const results = await Promise.allSettled(
        items.map((_, position) => this.executeRequest(ctx, scopeFor(position), position))
      );
      let failures = 0;
      results.forEach((result, position) => {
        if (result.status === 'rejected') {
          failures++;
          this.deps.logger.error(`Iteration ${position} of step "${ctx.name}" failed`, toError(result.reason));
        }
      });
      return failures;
    }

    let failures = 0;
    for (let position = 0; position < items.length; position++) {
      this.throwIfStopped();
      try {
        await this.executeRequest(ctx, scopeFor(position), position);
      } catch (error) {
        if (ctx.config.onError !== 'ignore') {
          throw error;
        }
        failures++;
        this.deps.logger.warn(
          `Iteration ${position} of step "${ctx.name}" failed, continuing (on_error: ignore): ${errorMessage(error)}`
        );
      }
    }
    return failures;
  }

  /**
   * Lists iterate their elements; mappings iterate `{ key, value }` entries
   */
  private resolveCollection(expression: string, name: string): JsonValue[] {
    const collection = this.deps.variables.get(name);
    if (collection === undefined) {
      throw ConfigurationError.invalidIteration(expression, `variable "${name}" is not defined`);
    }
    if (Array.isArray(collection)) {
      return [...collection];
    }
    if (collection !== null && typeof collection === 'object') {
      return Object.entries(collection).map(([key, value]) => ({ key, value }));
    }
    throw ConfigurationError.invalidIteration(expression, `variable "${name}" is not a list or mapping`);
  }

  private async executeRequest(ctx: StepContext, extra: TemplateContext, iteration?: number): Promise<void> {
    const { variables, configRenderer, sessions, observers, logger } = this.deps;
    const step = ctx.config;

    const scope: TemplateContext = { ...variables.getAll(), ...extra };
    const spec = await configRenderer.renderRequest(step.request, scope);
    const stores = step.store.map((store) => configRenderer.renderStore(store, scope));

    const session = sessions.getSession(step.session);
    const breakerConfig = step.retry?.circuitBreaker ?? session.circuitBreakerConfig;
    const retry = step.retry ?? session.retryConfig ?? DEFAULT_RETRY_CONFIG;
    // Sessions from outside the playbook are only seen here
    const conflict = breakerThresholdIssue(breakerConfig, retry.maxRetries);
    if (conflict) {
      throw new ConfigurationError({
        message: `Step "${ctx.name}" on session "${step.session}": ${conflict}`,
        path: 'retry.max_retries',
        context: { session: step.session },
      });
    }
    const client = new ResilientHttpClient(
      session,
      {
        retry,
        validateSsl: step.validateSsl ?? session.validateSsl,
        timeout: step.timeout ?? session.timeout,
      },
      {
        logger,
        circuitBreaker: session.circuitBreaker ?? (breakerConfig ? new CircuitBreaker(breakerConfig) : undefined),
        transportFactory: this.deps.transportFactory,
        sleep: this.deps.sleep,
      }
    );

    const requestId = generateExecutionId('req');
    observers.notify({
      type: ExecutionEventType.REQUEST_START,
      timestamp: new Date(),
      runId: ctx.phase.runId,
      stepId: ctx.id,
      requestId,
      method: spec.method,
      endpoint: spec.endpoint,
      iteration,
    });

    let failure: unknown;
    try {
      const response = await client.executeRequest(spec);
      if (stores.length > 0) {
        const stored = await variables.storeResponseData(stores, response.data);
        Object.assign(ctx.storedVars, stored);
      }
    } catch (error) {
      failure = error;
      throw error;
    } finally {
      await client.close();
      const metadata = client.metadata;
      ctx.retryCount += metadata?.retryCount ?? 0;
      observers.notify({
        type: ExecutionEventType.REQUEST_END,
        timestamp: new Date(),
        runId: ctx.phase.runId,
        stepId: ctx.id,
        requestId,
        method: spec.method,
        endpoint: spec.endpoint,
        iteration,
        statusCode: metadata?.statusCode,
        success: failure === undefined && metadata !== undefined && (metadata.statusCode ?? 0) < 400,
        error: failure !== undefined ? errorMessage(failure) : undefined,
        errors: metadata?.errors ?? [],
        attempts: metadata?.attempts ?? 0,
        requestSizeBytes: metadata?.requestSizeBytes ?? 0,
        responseSizeBytes: metadata?.responseSizeBytes ?? 0,
        durationMs: metadata?.durationMs ?? 0,
      });
    }
  }

  private throwIfStopped(): void {
    const reason = this.deps.stopReason();
    if (reason !== undefined) {
      throw new ExecutionCancelledError(reason);
    }
  }
}
