/**
 * Human-Readable Formatter
 *
 * Formats playbook execution for human consumption.
 * Uses symbols and colors for clear, scannable output.
 *
 * Symbols:
 * - ▶ Playbook started
 * - ▸ Phase started
 * - ● Step running (verbose)
 * - ✔ Success
 * - ✖ Failure
 * - ⚠ Warning
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  BackoffTimer,
  PlaybookError,
  visitEvent,
  type ExecutionEvent,
  type ExecutionEventVisitor,
  type PhaseEndEvent,
  type PhaseStartEvent,
  type PlaybookConfig,
  type PlaybookRunResult,
  type PlaybookStartEvent,
  type RequestEndEvent,
  type StepEndEvent,
  type StepStartEvent,
} from '@restplay/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';

const StatusSymbols = {
  playbook: '▶',
  phase: '▸',
  running: '●',
  success: '✔',
  failure: '✖',
  warning: '⚠',
  info: 'ℹ',
} as const;

const divider = (char: string, width = 60): string => char.repeat(width);

const plural = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? '' : 's'}`;

export class HumanFormatter implements Formatter {
  private readonly chalk: ChalkInstance;

  private readonly visitor: ExecutionEventVisitor = {
    onPlaybookStart: (event) => this.onPlaybookStart(event),
    onPhaseStart: (event) => this.onPhaseStart(event),
    onPhaseEnd: (event) => this.onPhaseEnd(event),
    onStepStart: (event) => this.onStepStart(event),
    onStepEnd: (event) => this.onStepEnd(event),
    onRequestEnd: (event) => this.onRequestEnd(event),
  };

  constructor(private readonly options: FormatterOptions = {}) {
    this.chalk = new Chalk({ level: options.noColor ? 0 : 1 });
  }

  notify(event: ExecutionEvent): void {
    visitEvent(event, this.visitor);
  }

  showResult(result: PlaybookRunResult): void {
    const { chalk } = this;
    console.log('');
    console.log(chalk.cyan(divider('═')));
    console.log(chalk.green.bold(`${StatusSymbols.success} Playbook completed in ${BackoffTimer.formatDelay(result.durationMs)}`));
    if (result.resumedFrom) {
      const { currentPhase, currentStep } = result.resumedFrom;
      console.log(chalk.dim(`  resumed after phase ${currentPhase}, step ${currentStep}`));
    }
    console.log(chalk.cyan(divider('═')));

    if (this.options.verbose) {
      const names = Object.keys(result.variables);
      console.log(chalk.bold('Variables:'), names.length > 0 ? names.join(', ') : chalk.dim('(none)'));
    }
  }

  showPlaybook(playbook: PlaybookConfig, source: string): void {
    const { chalk } = this;
    console.log(chalk.green(`${StatusSymbols.success} Playbook is valid: ${source}`));
    if (playbook.name) {
      console.log(`  Name: ${playbook.name}`);
    }
    if (playbook.description) {
      console.log(`  Description: ${playbook.description}`);
    }
    console.log(`  Phases: ${playbook.phases.length}`);
    playbook.phases.forEach((phase, index) => {
      const mode = phase.parallel ? ', parallel' : '';
      console.log(`    ${index + 1}. ${phase.name} (${plural(phase.steps.length, 'step')}${mode})`);
    });

    const sessions = Object.keys(playbook.sessions);
    if (sessions.length > 0) {
      console.log(`  Sessions: ${sessions.join(', ')}`);
    }
    if (playbook.incremental.enabled) {
      console.log(`  Incremental: ${playbook.incremental.store}`);
    }
  }

  showError(error: Error): void {
    const { chalk } = this;
    console.error('');
    const label = error instanceof PlaybookError ? `${StatusSymbols.failure} Error [${error.code}]:` : `${StatusSymbols.failure} Error:`;
    console.error(`${chalk.red.bold(label)} ${error.message}`);

    if (error instanceof PlaybookError && error.hint) {
      console.error(`${chalk.yellow('Hint:')} ${error.hint}`);
    }
    if (this.options.verbose && error.stack) {
      console.error(chalk.gray(error.stack));
    }
  }

  showWarning(message: string): void {
    console.warn(`${this.chalk.yellow(StatusSymbols.warning)} ${message}`);
  }

  showInfo(message: string): void {
    console.log(`${this.chalk.blue(StatusSymbols.info)} ${message}`);
  }

  // ==================== Event Handlers ====================

  private onPlaybookStart(event: PlaybookStartEvent): void {
    const { chalk } = this;
    console.log(chalk.cyan(divider('━')));
    console.log(chalk.bold(`${StatusSymbols.playbook} ${event.playbookName ?? 'Playbook'}`));
    console.log(chalk.dim(`   ${plural(event.phaseCount, 'phase')} to execute`));
    console.log(chalk.cyan(divider('━')));
  }

  private onPhaseStart(event: PhaseStartEvent): void {
    const mode = event.parallel ? ' (parallel)' : '';
    console.log(this.chalk.bold(`${StatusSymbols.phase} ${event.phaseName}${mode}`) + this.chalk.dim(` · ${plural(event.stepCount, 'step')}`));
  }

  private onPhaseEnd(event: PhaseEndEvent): void {
    if (event.failedSteps > 0) {
      this.showWarning(`${plural(event.failedSteps, 'step')} failed in parallel phase ${event.phaseName}`);
    }
  }

  private onStepStart(event: StepStartEvent): void {
    if (this.options.verbose) {
      console.log(this.chalk.dim(`  ${StatusSymbols.running} ${event.stepName} [${event.session}]`));
    }
  }

  private onStepEnd(event: StepEndEvent): void {
    const { chalk } = this;
    const duration = BackoffTimer.formatDelay(event.durationMs);
    const retries = event.retryCount === 1 ? ', 1 retry' : event.retryCount > 1 ? `, ${event.retryCount} retries` : '';

    if (event.success) {
      console.log(`  ${chalk.green(StatusSymbols.success)} ${event.stepName} ${chalk.dim(`${duration}${retries}`)}`);
    } else {
      console.log(`  ${chalk.red(StatusSymbols.failure)} ${event.stepName} ${chalk.red(`${duration}${retries}`)}`);
      if (event.error) {
        console.log(`    ${chalk.red('Error:')} ${event.error}`);
      }
    }

    if (this.options.verbose) {
      for (const name of Object.keys(event.storedVars)) {
        console.log(chalk.dim(`    stored ${name}`));
      }
    }
  }

  private onRequestEnd(event: RequestEndEvent): void {
    if (!this.options.verbose) {
      return;
    }
    const status = event.statusCode !== undefined ? String(event.statusCode) : 'no response';
    const iteration = event.iteration !== undefined ? ` #${event.iteration}` : '';
    console.log(
      this.chalk.dim(
        `    ${event.method} ${event.endpoint}${iteration} → ${status} (${plural(event.attempts, 'attempt')}, ${BackoffTimer.formatDelay(event.durationMs)})`
      )
    );
  }
}
