/**
 * Playbook Execution Engine
 *
 * Runs a validated playbook: phases in declaration order, steps inside a
 * phase sequentially or concurrently, requests inside a step once or once
 * per iteration item. Progress is checkpointed after each completed unit
 * when incremental execution is enabled, and a later run of the same
 * playbook resumes from the last checkpoint.
 *
 * Lifecycle of `execute()`:
 * 1. PlaybookStart
 * 2. Load checkpoint (incremental only) and restore variables
 * 3. Materialize playbook-scoped sessions
 * 4. Phases, each wrapped in PhaseStart / PhaseEnd
 * 5. Always: drop temporary sessions, PlaybookEnd, observer cleanup;
 *    on success only: clear the checkpoint
 *
 * @module execution
 */

import type { SleepFn } from '../automation/runtime/BackoffTimer.js';
import {
  CheckpointManager,
  shouldRestartParallelPhase,
  shouldSkipPhase,
  shouldSkipStep,
  type CheckpointPosition,
} from '../checkpoint/CheckpointManager.js';
import type { CheckpointStore } from '../checkpoint/CheckpointStore.js';
import { createCheckpointStore } from '../checkpoint/createCheckpointStore.js';
import { ConfigRenderer } from '../context/ConfigRenderer.js';
import { TemplateRenderer } from '../context/TemplateRenderer.js';
import { VariableManager } from '../context/VariableManager.js';
import { createSilentLogger, type EngineLogger } from '../core/EngineLogger.js';
import { ExecutionCancelledError, errorMessage, toError } from '../errors/index.js';
import { ExecutionEventType } from '../events/ExecutionEvents.js';
import { MetricsObserver } from '../events/MetricsObserver.js';
import { ObserverManager, type ExecutionObserver } from '../events/ObserverManager.js';
import type { TransportFactory } from '../http/HttpTransport.js';
import type { AuthenticatorFactory, SessionProvider } from '../session/Session.js';
import { SessionManager } from '../session/SessionManager.js';
import type { PhaseConfig, PlaybookConfig, Variables } from '../types/core-types.js';
import { createPhaseContext, generateExecutionId, type PhaseContext } from './ExecutionContext.js';
import { StepExecutor } from './StepExecutor.js';

export interface PlaybookEngineOptions {
  logger?: EngineLogger;
  observers?: readonly ExecutionObserver[];
  /** Replaces the store described by the playbook's `incremental` block */
  checkpointStore?: CheckpointStore;
  transportFactory?: TransportFactory;
  /** Extra auth types, keyed by `auth.type` */
  authenticators?: Readonly<Record<string, AuthenticatorFactory>>;
  renderer?: TemplateRenderer;
  sleep?: SleepFn;
  /** Base directory for `fromFile` request bodies */
  cwd?: string;
}

export interface PlaybookRunResult {
  runId: string;
  /** Variables at the end of the run */
  variables: Variables;
  /** Checkpoint the run resumed from, if any */
  resumedFrom?: CheckpointPosition;
  durationMs: number;
}

interface RunState {
  runId: string;
  variables: VariableManager;
  observers: ObserverManager;
  checkpoints: CheckpointManager;
  steps: StepExecutor;
}

export class PlaybookExecutionEngine {
  private readonly logger: EngineLogger;
  private readonly renderer: TemplateRenderer;
  private stopReason: string | undefined;

  constructor(private readonly options: PlaybookEngineOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.renderer = options.renderer ?? new TemplateRenderer();
  }

  /**
   * Ask the running playbook to stop. Units already in flight finish;
   * no new phase, step or iteration starts, and `execute()` rejects with
   * ExecutionCancelledError. The checkpoint is kept for the next run.
   */
  requestStop(reason = 'stop requested'): void {
    if (this.stopReason === undefined) {
      this.stopReason = reason;
      this.logger.warn(`Stopping playbook: ${reason}`);
    }
  }

  get stopRequested(): boolean {
    return this.stopReason !== undefined;
  }

  async execute(config: PlaybookConfig, sessionProvider: SessionProvider): Promise<PlaybookRunResult> {
    const runId = generateExecutionId('run');
    const startedAt = Date.now();
    const logger = this.logger;

    const variables = new VariableManager(logger.child('variables'));
    const configRenderer = new ConfigRenderer(this.renderer, { cwd: this.options.cwd });
    const sessions = new SessionManager({
      provider: sessionProvider,
      renderer: configRenderer,
      variables,
      logger,
      authenticators: this.options.authenticators,
    });
    sessions.register(config.sessions);

    const observers = new ObserverManager(logger, [
      ...(this.options.observers ?? []),
      ...(config.metrics.enabled ? [new MetricsObserver(config.metrics, logger.child('metrics'))] : []),
    ]);

    observers.notify({
      type: ExecutionEventType.PLAYBOOK_START,
      timestamp: new Date(),
      runId,
      playbookName: config.name,
      phaseCount: config.phases.length,
    });
    logger.info(`Running playbook${config.name ? ` "${config.name}"` : ''}`, {
      runId,
      phases: config.phases.length,
    });

    let checkpoints: CheckpointManager | undefined;
    let succeeded = false;
    let failure: unknown;
    try {
      checkpoints = new CheckpointManager(config, this.resolveCheckpointStore(config, sessions), logger.child('checkpoint'));
      const checkpoint = checkpoints.enabled ? await checkpoints.load() : null;
      if (checkpoint) {
        variables.setAll(checkpoint.variables);
      }

      sessions.initializeTempSessions();

      const state: RunState = {
        runId,
        variables,
        observers,
        checkpoints,
        steps: new StepExecutor({
          variables,
          configRenderer,
          sessions,
          observers,
          logger,
          transportFactory: this.options.transportFactory,
          sleep: this.options.sleep,
          stopReason: () => this.stopReason,
        }),
      };

      let position: CheckpointPosition | null = checkpoint;
      for (let index = 0; index < config.phases.length; index++) {
        const phase = config.phases[index];
        if (shouldSkipPhase(index, position)) {
          logger.debug(`Skipping phase "${phase.name}" (completed in a previous run)`);
          continue;
        }
        this.throwIfStopped();
        if (phase.parallel && shouldRestartParallelPhase(index, position)) {
          logger.info(`Restarting parallel phase "${phase.name}" from its first step`);
          position = null;
        }
        await this.runPhase(state, createPhaseContext(runId, index, phase), position);
      }

      succeeded = true;
      return {
        runId,
        variables: variables.getAll(),
        resumedFrom: checkpoint
          ? { currentPhase: checkpoint.currentPhase, currentStep: checkpoint.currentStep }
          : undefined,
        durationMs: Date.now() - startedAt,
      };
    } catch (error) {
      failure = error;
      logger.error(`Playbook failed: ${errorMessage(error)}`, toError(error));
      throw error;
    } finally {
      sessions.clearTempSessions();
      const durationMs = Date.now() - startedAt;
      observers.notify({
        type: ExecutionEventType.PLAYBOOK_END,
        timestamp: new Date(),
        runId,
        playbookName: config.name,
        success: succeeded,
        durationMs,
        error: failure !== undefined ? errorMessage(failure) : undefined,
      });
      await observers.cleanup();
      if (succeeded && checkpoints) {
        await checkpoints.clear();
      }
      if (succeeded) {
        logger.info(`Playbook completed in ${durationMs}ms`, { runId });
      }
    }
  }

  private resolveCheckpointStore(config: PlaybookConfig, sessions: SessionManager): CheckpointStore | null {
    if (!config.incremental.enabled) {
      return null;
    }
    return (
      this.options.checkpointStore ??
      createCheckpointStore(config.incremental, {
        logger: this.logger.child('checkpoint'),
        resolveSession: (name) => sessions.getSession(name),
        transportFactory: this.options.transportFactory,
        sleep: this.options.sleep,
      })
    );
  }

  private async runPhase(state: RunState, phase: PhaseContext, position: CheckpointPosition | null): Promise<void> {
    const config: PhaseConfig = phase.config;
    const base = {
      runId: state.runId,
      phaseId: phase.id,
      phaseIndex: phase.index,
      phaseName: config.name,
      parallel: config.parallel,
    };

    state.observers.notify({
      type: ExecutionEventType.PHASE_START,
      timestamp: new Date(),
      ...base,
      stepCount: config.steps.length,
    });
    this.logger.info(`Phase "${config.name}" started`, {
      parallel: config.parallel,
      steps: config.steps.length,
    });

    let failedSteps = 0;
    let completed = false;
    try {
      if (config.parallel) {
        failedSteps = await this.runParallelSteps(state, phase);
        // Parallel phases checkpoint once, as a whole
        await state.checkpoints.save(phase.index, config.steps.length - 1, state.variables.getAll());
      } else {
        await this.runSequentialSteps(state, phase, position);
      }
      completed = true;
    } finally {
      state.observers.notify({
        type: ExecutionEventType.PHASE_END,
        timestamp: new Date(),
        ...base,
        success: completed && failedSteps === 0,
        failedSteps,
        durationMs: Date.now() - phase.startedAt,
      });
    }
  }

  private async runSequentialSteps(
    state: RunState,
    phase: PhaseContext,
    position: CheckpointPosition | null
  ): Promise<void> {
    const steps = phase.config.steps;
    for (let index = 0; index < steps.length; index++) {
      if (shouldSkipStep(phase.index, index, position)) {
        this.logger.debug(`Skipping step ${index} of phase "${phase.config.name}" (completed in a previous run)`);
        continue;
      }
      this.throwIfStopped();
      await state.steps.execute(phase, index, steps[index]);
      await state.checkpoints.save(phase.index, index, state.variables.getAll());
    }
  }

  /**
   * Step failures are logged and counted; they do not stop sibling steps
   * or the run.
   *
   * @returns Number of failed steps
   */
  private async runParallelSteps(state: RunState, phase: PhaseContext): Promise<number> {
    const steps = phase.config.steps;
    const results = await Promise.allSettled(steps.map((step, index) => state.steps.execute(phase, index, step)));

    let failed = 0;
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        failed++;
        this.logger.error(`Step ${index} of parallel phase "${phase.config.name}" failed`, toError(result.reason));
      }
    });
    if (this.stopReason !== undefined) {
      throw new ExecutionCancelledError(this.stopReason);
    }
    return failed;
  }

  private throwIfStopped(): void {
    if (this.stopReason !== undefined) {
      throw new ExecutionCancelledError(this.stopReason);
    }
  }
}
