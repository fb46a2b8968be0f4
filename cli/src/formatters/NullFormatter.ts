/**
 * Null Formatter
 *
 * Produces no output. For scripts that only care about the exit code.
 */

import type { ExecutionEvent, PlaybookConfig, PlaybookRunResult } from '@restplay/engine';
import type { Formatter } from './Formatter.js';

export class NullFormatter implements Formatter {
  notify(_event: ExecutionEvent): void {}

  showResult(_result: PlaybookRunResult): void {}

  showPlaybook(_playbook: PlaybookConfig, _source: string): void {}

  showError(_error: Error): void {}

  showWarning(_message: string): void {}

  showInfo(_message: string): void {}
}
