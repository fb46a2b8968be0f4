/**
 * CLI Run Command Options
 *
 * Options for `restplay run`, as commander hands them to the action.
 */

export interface CliRunOptions {
  /**
   * `--no-resume` sets this to false: incremental execution is disabled
   * for this run, so no checkpoint is loaded or written
   */
  resume: boolean;

  /**
   * Path to a JSON/YAML map of session configs
   */
  sessions?: string;

  /**
   * Output format
   */
  format: string;

  /**
   * Engine log level (debug|info|warn|error|fatal|silent)
   */
  logLevel: string;

  /**
   * Cron expression; the playbook runs on every match until interrupted
   */
  cron?: string;

  /**
   * Verbose output (debug logs, request lines, stack traces)
   */
  verbose?: boolean;

  /**
   * `--no-color` sets this to false
   */
  color: boolean;
}
