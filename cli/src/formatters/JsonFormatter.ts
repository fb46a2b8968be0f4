/**
 * JSON Formatter
 *
 * Machine-readable output for log aggregation and CI. Every event is one
 * JSON line on stdout (NDJSON); the final result and errors are lines too.
 */

import {
  PlaybookError,
  serializeEvent,
  type ExecutionEvent,
  type PlaybookConfig,
  type PlaybookRunResult,
} from '@restplay/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';

export class JsonFormatter implements Formatter {
  constructor(private readonly options: FormatterOptions = {}) {}

  notify(event: ExecutionEvent): void {
    console.log(JSON.stringify(serializeEvent(event)));
  }

  showResult(result: PlaybookRunResult): void {
    console.log(
      JSON.stringify({
        type: 'playbook.result',
        timestamp: new Date().toISOString(),
        runId: result.runId,
        durationMs: result.durationMs,
        resumedFrom: result.resumedFrom,
        variables: this.options.verbose ? result.variables : undefined,
      })
    );
  }

  showPlaybook(playbook: PlaybookConfig, source: string): void {
    console.log(
      JSON.stringify({
        type: 'playbook.valid',
        source,
        name: playbook.name,
        phases: playbook.phases.map((phase) => ({
          name: phase.name,
          parallel: phase.parallel,
          steps: phase.steps.length,
        })),
        sessions: Object.keys(playbook.sessions),
        incremental: playbook.incremental.enabled,
      })
    );
  }

  showError(error: Error): void {
    const body =
      error instanceof PlaybookError
        ? error.toJSON()
        : { name: error.name, message: error.message, stack: this.options.verbose ? error.stack : undefined };

    console.error(JSON.stringify({ type: 'error', timestamp: new Date().toISOString(), error: body }));
  }

  showWarning(message: string): void {
    console.log(JSON.stringify({ type: 'warning', timestamp: new Date().toISOString(), message }));
  }

  showInfo(message: string): void {
    console.log(JSON.stringify({ type: 'info', timestamp: new Date().toISOString(), message }));
  }
}
