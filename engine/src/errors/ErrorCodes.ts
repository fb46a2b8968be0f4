/**
 * Playbook Error Codes
 *
 * Format: PB-[Category]-[Number]
 *
 * Categories:
 * - C: Configuration errors (parsing, schema, unknown sessions)
 * - H: HTTP errors (auth, rate limit, retry exhaustion, TLS)
 * - E: Execution errors (extraction, templating, cancellation)
 * - K: Checkpoint errors (store I/O)
 *
 * ADDING NEW ERRORS:
 * 1. Add the code below
 * 2. Add a description and a suggested action
 * 3. Map it to an exit code if it is not an execution failure
 *
 * @module errors
 */

/**
 * Process exit codes used by hosts
 */
export enum ExitCode {
  SUCCESS = 0,
  EXECUTION_FAILED = 1,
  CONFIGURATION_ERROR = 2,
  CANCELLED = 130,
}

export enum PlaybookErrorCode {
  // ============================================================================
  // CONFIGURATION ERRORS (C)
  // ============================================================================

  /** Malformed YAML/JSON */
  CONFIG_PARSE_ERROR = 'PB-C-001',

  /** Document does not match the playbook schema */
  CONFIG_INVALID = 'PB-C-002',

  /** Playbook or request data file missing */
  CONFIG_FILE_NOT_FOUND = 'PB-C-003',

  /** `iterate` expression or collection is unusable */
  CONFIG_INVALID_ITERATION = 'PB-C-004',

  /** Step references a session nobody provides */
  CONFIG_UNKNOWN_SESSION = 'PB-C-005',

  /** Session auth type has no registered authenticator */
  CONFIG_UNSUPPORTED_AUTH = 'PB-C-006',

  // ============================================================================
  // HTTP ERRORS (H)
  // ============================================================================

  HTTP_AUTHENTICATION_FAILED = 'PB-H-001',
  HTTP_RATE_LIMITED = 'PB-H-002',
  HTTP_RETRYABLE = 'PB-H-003',
  HTTP_SSL_VERIFICATION = 'PB-H-004',
  HTTP_RETRY_EXCEEDED = 'PB-H-005',
  HTTP_UNKNOWN = 'PB-H-006',

  // ============================================================================
  // EXECUTION ERRORS (E)
  // ============================================================================

  EXECUTION_EXTRACTION_FAILED = 'PB-E-001',
  EXECUTION_TEMPLATE_FAILED = 'PB-E-002',
  EXECUTION_CANCELLED = 'PB-E-003',

  // ============================================================================
  // CHECKPOINT ERRORS (K)
  // ============================================================================

  CHECKPOINT_STORE_FAILED = 'PB-K-001',
}

export function getErrorCategory(code: PlaybookErrorCode): string {
  if (code.startsWith('PB-C-')) return 'ConfigurationError';
  if (code.startsWith('PB-H-')) return 'HttpError';
  if (code.startsWith('PB-E-')) return 'ExecutionError';
  if (code.startsWith('PB-K-')) return 'CheckpointError';
  return 'UnknownError';
}

export function getErrorDescription(code: PlaybookErrorCode): string {
  const descriptions: Record<PlaybookErrorCode, string> = {
    [PlaybookErrorCode.CONFIG_PARSE_ERROR]: 'The playbook is not valid YAML or JSON.',
    [PlaybookErrorCode.CONFIG_INVALID]: 'The playbook does not match the expected structure.',
    [PlaybookErrorCode.CONFIG_FILE_NOT_FOUND]: 'A file referenced by the playbook does not exist.',
    [PlaybookErrorCode.CONFIG_INVALID_ITERATION]: 'A step iterates over something that is not a list or mapping variable.',
    [PlaybookErrorCode.CONFIG_UNKNOWN_SESSION]: 'A step or store references a session that is neither defined in the playbook nor provided by the host.',
    [PlaybookErrorCode.CONFIG_UNSUPPORTED_AUTH]: 'A session uses an authentication type with no registered authenticator.',
    [PlaybookErrorCode.HTTP_AUTHENTICATION_FAILED]: 'The server kept rejecting credentials after refresh and re-authentication.',
    [PlaybookErrorCode.HTTP_RATE_LIMITED]: 'The server answered 429 Too Many Requests.',
    [PlaybookErrorCode.HTTP_RETRYABLE]: 'A transient server or connection failure occurred.',
    [PlaybookErrorCode.HTTP_SSL_VERIFICATION]: 'The server certificate could not be verified.',
    [PlaybookErrorCode.HTTP_RETRY_EXCEEDED]: 'The request failed on every allowed attempt.',
    [PlaybookErrorCode.HTTP_UNKNOWN]: 'The request failed for an unexpected reason.',
    [PlaybookErrorCode.EXECUTION_EXTRACTION_FAILED]: 'A store query could not be evaluated against the response body.',
    [PlaybookErrorCode.EXECUTION_TEMPLATE_FAILED]: 'A template could not be rendered.',
    [PlaybookErrorCode.EXECUTION_CANCELLED]: 'The run was stopped before it finished.',
    [PlaybookErrorCode.CHECKPOINT_STORE_FAILED]: 'The checkpoint store could not be read or written.',
  };

  return descriptions[code];
}

export function getSuggestedAction(code: PlaybookErrorCode): string {
  const actions: Record<PlaybookErrorCode, string> = {
    [PlaybookErrorCode.CONFIG_PARSE_ERROR]: 'Fix the YAML/JSON syntax',
    [PlaybookErrorCode.CONFIG_INVALID]: 'Correct the fields listed in the error',
    [PlaybookErrorCode.CONFIG_FILE_NOT_FOUND]: 'Check the path; relative paths resolve against the working directory',
    [PlaybookErrorCode.CONFIG_INVALID_ITERATION]: 'Store the collection in an earlier step and use "item in collection"',
    [PlaybookErrorCode.CONFIG_UNKNOWN_SESSION]: 'Define the session under "sessions" or pass it to the host',
    [PlaybookErrorCode.CONFIG_UNSUPPORTED_AUTH]: 'Register an authenticator factory for this auth type',
    [PlaybookErrorCode.HTTP_AUTHENTICATION_FAILED]: 'Check the session credentials',
    [PlaybookErrorCode.HTTP_RATE_LIMITED]: 'Lower the request rate or raise max_retries',
    [PlaybookErrorCode.HTTP_RETRYABLE]: 'Retry later or raise max_retries',
    [PlaybookErrorCode.HTTP_SSL_VERIFICATION]: 'Fix the certificate or set validate_ssl: false for trusted hosts',
    [PlaybookErrorCode.HTTP_RETRY_EXCEEDED]: 'Check the service health; raise max_retries or max_delay',
    [PlaybookErrorCode.HTTP_UNKNOWN]: 'Check the endpoint and base_url',
    [PlaybookErrorCode.EXECUTION_EXTRACTION_FAILED]: 'Check the store query against the logged response body',
    [PlaybookErrorCode.EXECUTION_TEMPLATE_FAILED]: 'Check the template syntax',
    [PlaybookErrorCode.EXECUTION_CANCELLED]: 'Re-run to resume from the last checkpoint',
    [PlaybookErrorCode.CHECKPOINT_STORE_FAILED]: 'Check the checkpoint directory or remote store',
  };

  return actions[code];
}

export function getExitCodeForError(code: PlaybookErrorCode): ExitCode {
  if (code.startsWith('PB-C-')) {
    return ExitCode.CONFIGURATION_ERROR;
  }
  if (code === PlaybookErrorCode.EXECUTION_CANCELLED) {
    return ExitCode.CANCELLED;
  }
  return ExitCode.EXECUTION_FAILED;
}

/**
 * Whether another attempt might succeed
 */
export function isRetryable(code: PlaybookErrorCode): boolean {
  const retryableErrors = [
    PlaybookErrorCode.HTTP_RATE_LIMITED,
    PlaybookErrorCode.HTTP_RETRYABLE,
  ];

  return retryableErrors.includes(code);
}

/**
 * Whether the user can fix this by editing the playbook
 */
export function isUserError(code: PlaybookErrorCode): boolean {
  return code.startsWith('PB-C-');
}
