/**
 * Cron Scheduler
 *
 * Runs one job on a cron schedule using node-cron. A tick that fires while
 * the previous run is still going is skipped. A failed run is reported and
 * scheduling carries on.
 *
 * @module scheduling
 */

import cron from 'node-cron';
import { createSilentLogger, type EngineLogger } from '../core/EngineLogger.js';
import { ConfigurationError, errorMessage, toError } from '../errors/index.js';

export type CronExecutionStatus = 'running' | 'completed' | 'failed';

export interface CronExecution {
  /** 1-based run number */
  sequence: number;
  startedAt: Date;
  completedAt?: Date;
  durationMs?: number;
  status: CronExecutionStatus;
  error?: Error;
}

export interface CronSchedulerListeners {
  onExecutionComplete?: (execution: CronExecution) => void;
  onExecutionFailed?: (execution: CronExecution, error: Error) => void;
  /** A tick arrived while `running` was still in progress */
  onExecutionSkipped?: (running: CronExecution) => void;
}

/**
 * What the scheduler needs from a scheduled task
 */
export interface CronTask {
  stop(): void | Promise<void>;
}

/**
 * Creates a started task calling `onTick` on every match of `expression`
 */
export type CronTaskFactory = (
  expression: string,
  onTick: () => Promise<void>,
  options: { timezone?: string }
) => CronTask;

export interface CronSchedulerOptions {
  /** IANA zone the expression is read in; the host's zone by default */
  timezone?: string;
  logger?: EngineLogger;
  listeners?: CronSchedulerListeners;
  /** Replaces node-cron, for tests */
  createTask?: CronTaskFactory;
}

const createNodeCronTask: CronTaskFactory = (expression, onTick, options) =>
  cron.schedule(expression, onTick, { timezone: options.timezone, noOverlap: true });

export class CronScheduler {
  private task: CronTask | undefined;
  private current: { execution: CronExecution; done: Promise<void> } | undefined;
  private sequence = 0;
  private readonly logger: EngineLogger;

  constructor(
    private readonly expression: string,
    private readonly job: () => Promise<void>,
    private readonly options: CronSchedulerOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
  }

  static isValid(expression: string): boolean {
    return cron.validate(expression);
  }

  /**
   * @throws {ConfigurationError} for an invalid expression
   */
  static assertValid(expression: string): void {
    if (!CronScheduler.isValid(expression)) {
      throw new ConfigurationError({
        message: `Invalid cron expression: ${expression}`,
        path: '--cron',
        context: { expression },
      });
    }
  }

  get isRunning(): boolean {
    return this.task !== undefined;
  }

  get executionCount(): number {
    return this.sequence;
  }

  start(): void {
    if (this.task) {
      throw new Error('Scheduler is already running');
    }
    CronScheduler.assertValid(this.expression);

    const createTask = this.options.createTask ?? createNodeCronTask;
    this.task = createTask(this.expression, () => this.handleTick(), { timezone: this.options.timezone });
    this.logger.info(`Scheduled with cron expression "${this.expression}"`, {
      timezone: this.options.timezone,
    });
  }

  /**
   * Stop scheduling and wait for the run in progress, if any
   */
  async stop(): Promise<void> {
    const task = this.task;
    this.task = undefined;
    if (task) {
      await task.stop();
      this.logger.info(`Scheduler stopped after ${this.sequence} run(s)`);
    }
    await this.current?.done;
  }

  private async handleTick(): Promise<void> {
    if (!this.task) {
      return;
    }
    if (this.current) {
      this.logger.warn(`Run ${this.current.execution.sequence} still in progress, skipping this tick`);
      this.options.listeners?.onExecutionSkipped?.(this.current.execution);
      return;
    }

    const execution: CronExecution = { sequence: ++this.sequence, startedAt: new Date(), status: 'running' };
    const done = this.execute(execution);
    this.current = { execution, done };
    try {
      await done;
    } finally {
      this.current = undefined;
    }
  }

  private async execute(execution: CronExecution): Promise<void> {
    this.logger.info(`Scheduled run ${execution.sequence} started`);
    try {
      await this.job();
      this.finish(execution, 'completed');
      this.logger.info(`Scheduled run ${execution.sequence} completed in ${execution.durationMs}ms`);
      this.options.listeners?.onExecutionComplete?.(execution);
    } catch (error) {
      const err = toError(error);
      execution.error = err;
      this.finish(execution, 'failed');
      this.logger.error(`Scheduled run ${execution.sequence} failed: ${errorMessage(error)}`);
      this.options.listeners?.onExecutionFailed?.(execution, err);
    }
  }

  private finish(execution: CronExecution, status: CronExecutionStatus): void {
    execution.status = status;
    execution.completedAt = new Date();
    execution.durationMs = execution.completedAt.getTime() - execution.startedAt.getTime();
  }
}
