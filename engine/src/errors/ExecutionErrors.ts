/**
 * Execution Errors
 *
 * Failures raised while running steps, as opposed to loading the playbook
 * or talking to the network.
 *
 * @module errors
 */

import { PlaybookError } from './PlaybookError.js';
import { PlaybookErrorCode } from './ErrorCodes.js';

/** Bodies longer than this are truncated in error context */
const BODY_PREVIEW_LIMIT = 2000;

export class VariableExtractionError extends PlaybookError {
  public readonly variable: string;
  public readonly query?: string;
  /** The (possibly truncated) body the query ran against */
  public readonly bodyPreview: string;

  constructor(variable: string, query: string | undefined, body: unknown, cause: unknown) {
    const bodyPreview = previewBody(body);
    super({
      code: PlaybookErrorCode.EXECUTION_EXTRACTION_FAILED,
      message: `Failed to extract "${variable}"` +
        (query ? ` with query "${query}"` : '') +
        `: ${cause instanceof Error ? cause.message : describeCause(cause)}`,
      context: { variable, query, body: bodyPreview },
      cause,
    });
    this.name = 'VariableExtractionError';
    this.variable = variable;
    this.query = query;
    this.bodyPreview = bodyPreview;
  }
}

export class TemplateRenderError extends PlaybookError {
  constructor(template: string, reason: string) {
    super({
      code: PlaybookErrorCode.EXECUTION_TEMPLATE_FAILED,
      message: `Cannot render template "${template}": ${reason}`,
      context: { template },
    });
    this.name = 'TemplateRenderError';
  }
}

export class ExecutionCancelledError extends PlaybookError {
  constructor(reason: string) {
    super({
      code: PlaybookErrorCode.EXECUTION_CANCELLED,
      message: `Execution cancelled: ${reason}`,
      context: { reason },
    });
    this.name = 'ExecutionCancelledError';
  }
}

function previewBody(body: unknown): string {
  const text = typeof body === 'string' ? body : JSON.stringify(body) ?? String(body);
  return text.length > BODY_PREVIEW_LIMIT ? `${text.slice(0, BODY_PREVIEW_LIMIT)}...` : text;
}

function describeCause(cause: unknown): string {
  if (typeof cause === 'object' && cause !== null && 'message' in cause && typeof cause.message === 'string') {
    return cause.message;
  }
  return String(cause);
}
