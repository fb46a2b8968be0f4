/**
 * Base Formatter Interface
 *
 * Formatters are the only place the CLI writes to the terminal. They
 * observe the engine's execution events and render them.
 *
 * Separation of Concerns:
 * - Engine: emits ExecutionEvents, logs through EngineLogger (stderr)
 * - Formatter: decides WHAT to display and WHEN (observer)
 * - Console: where output goes (stdout/stderr)
 */

import type { ExecutionObserver, PlaybookConfig, PlaybookRunResult } from '@restplay/engine';

/**
 * Formatter options
 */
export interface FormatterOptions {
  /** More details: request lines, stored variables, stack traces */
  verbose?: boolean;

  /** Disable colors (CI or terminals without color support) */
  noColor?: boolean;
}

export interface Formatter extends ExecutionObserver {
  /**
   * Display the final result of a successful run
   */
  showResult(result: PlaybookRunResult): void;

  /**
   * Display a validated playbook (`validate` command)
   */
  showPlaybook(playbook: PlaybookConfig, source: string): void;

  /**
   * Display an error. Called for run failures and CLI-level errors.
   */
  showError(error: Error): void;

  showWarning(message: string): void;

  showInfo(message: string): void;
}
