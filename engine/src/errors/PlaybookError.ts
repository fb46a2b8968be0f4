/**
 * Base Playbook Error Class
 *
 * Every error the engine raises on purpose extends this class and carries a
 * diagnostic: a structured code, an optional location inside the playbook,
 * a hint and free-form context for logs.
 *
 * @module errors
 */

import {
  ExitCode,
  PlaybookErrorCode,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
  getSuggestedAction,
  isRetryable,
  isUserError,
} from './ErrorCodes.js';

export interface PlaybookErrorDiagnostic {
  /** Structured error code (e.g., PB-C-002) */
  code: PlaybookErrorCode;

  /** Human-readable error message */
  message: string;

  /** Process exit code for hosts */
  exitCode?: ExitCode;

  /** Location in the playbook (e.g., "phases[1].steps[0].request") */
  path?: string;

  /** Optional suggestion for fixing the error */
  hint?: string;

  /** Additional context data for debugging */
  context?: Record<string, unknown>;

  /** Underlying error */
  cause?: unknown;
}

/**
 * @example
 * ```typescript
 * throw new PlaybookError({
 *   code: PlaybookErrorCode.CONFIG_INVALID,
 *   message: 'Duplicate phase name "setup"',
 *   path: 'phases[2].name',
 * });
 * ```
 */
export class PlaybookError extends Error {
  public readonly diagnostic: Required<Pick<PlaybookErrorDiagnostic, 'code' | 'exitCode' | 'hint'>> &
    PlaybookErrorDiagnostic;

  public readonly timestamp: Date;

  constructor(diagnostic: PlaybookErrorDiagnostic) {
    super(diagnostic.message, diagnostic.cause !== undefined ? { cause: diagnostic.cause } : undefined);
    this.name = getErrorCategory(diagnostic.code);
    this.diagnostic = {
      ...diagnostic,
      exitCode: diagnostic.exitCode ?? getExitCodeForError(diagnostic.code),
      hint: diagnostic.hint ?? getSuggestedAction(diagnostic.code),
    };
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get code(): PlaybookErrorCode {
    return this.diagnostic.code;
  }

  get exitCode(): ExitCode {
    return this.diagnostic.exitCode;
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string {
    return this.diagnostic.hint;
  }

  get context(): Record<string, unknown> {
    return this.diagnostic.context ?? {};
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  get isUserError(): boolean {
    return isUserError(this.code);
  }

  get isRetryable(): boolean {
    return isRetryable(this.code);
  }

  /**
   * Format error as string for logging/display
   */
  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `: ${this.message}`;

    if (this.hint) {
      msg += `\n  Hint: ${this.hint}`;
    }

    return msg;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      exitCode: this.exitCode,
      path: this.path,
      hint: this.hint,
      context: this.diagnostic.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Best-effort message for anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}
