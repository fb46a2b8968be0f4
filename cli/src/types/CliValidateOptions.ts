/**
 * CLI Validate Command Options
 */

export interface CliValidateOptions {
  format: string;
  verbose?: boolean;
  /** `--no-color` sets this to false */
  color: boolean;
}
