/**
 * Configuration Errors
 *
 * Raised before or during a run when the playbook itself is at fault.
 * These never retry.
 *
 * @module errors
 */

import type { ZodIssue } from 'zod';
import { PlaybookError, type PlaybookErrorDiagnostic } from './PlaybookError.js';
import { PlaybookErrorCode } from './ErrorCodes.js';

export class ConfigurationError extends PlaybookError {
  constructor(diagnostic: Omit<PlaybookErrorDiagnostic, 'code'> & { code?: PlaybookErrorCode }) {
    super({ ...diagnostic, code: diagnostic.code ?? PlaybookErrorCode.CONFIG_INVALID });
    this.name = 'ConfigurationError';
  }

  static parseError(source: string, detail: string, cause?: unknown): ConfigurationError {
    return new ConfigurationError({
      code: PlaybookErrorCode.CONFIG_PARSE_ERROR,
      message: `Failed to parse playbook ${source}: ${detail}`,
      context: { source },
      cause,
    });
  }

  /**
   * One error listing every schema issue, each as `path: message`
   */
  static fromIssues(issues: readonly ZodIssue[], source = 'playbook'): ConfigurationError {
    const lines = issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`);
    return new ConfigurationError({
      code: PlaybookErrorCode.CONFIG_INVALID,
      message: `Invalid ${source}:\n  ${lines.join('\n  ')}`,
      path: issues.length > 0 ? formatIssuePath(issues[0].path) : undefined,
      context: { issues: lines },
    });
  }

  static fileNotFound(filePath: string, what = 'File'): ConfigurationError {
    return new ConfigurationError({
      code: PlaybookErrorCode.CONFIG_FILE_NOT_FOUND,
      message: `${what} not found: ${filePath}`,
      context: { filePath },
    });
  }

  static invalidIteration(expression: string, reason: string): ConfigurationError {
    return new ConfigurationError({
      code: PlaybookErrorCode.CONFIG_INVALID_ITERATION,
      message: `Cannot iterate "${expression}": ${reason}`,
      context: { expression },
    });
  }

  static unsupportedAuth(session: string, type: string): ConfigurationError {
    return new ConfigurationError({
      code: PlaybookErrorCode.CONFIG_UNSUPPORTED_AUTH,
      message: `Session "${session}" uses auth type "${type}" but no authenticator is registered for it`,
      context: { session, type },
    });
  }
}

/**
 * Raised by session providers for unknown names
 */
export class SessionNotFoundError extends ConfigurationError {
  public readonly sessionName: string;

  constructor(sessionName: string) {
    super({
      code: PlaybookErrorCode.CONFIG_UNKNOWN_SESSION,
      message: `Session not found: ${sessionName}`,
      context: { session: sessionName },
    });
    this.name = 'SessionNotFoundError';
    this.sessionName = sessionName;
  }
}

/**
 * Render a zod issue path as `phases[0].steps[1].request`
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) return '(root)';
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}
