/**
 * Validate Command
 *
 * Loads and validates a playbook without executing it: YAML/JSON syntax,
 * schema, and cross-field rules. Prints a summary of phases and sessions.
 *
 * Usage:
 *   restplay validate playbook.yaml
 *   restplay validate playbook.yaml --format json
 *
 * Exit codes:
 *   0 - Playbook is valid
 *   2 - Playbook is invalid or unreadable
 */

import type { Command } from 'commander';
import { ExitCode, PlaybookError, PlaybookLoader, toError } from '@restplay/engine';
import { createFormatter, FORMATTER_TYPES, isFormatterType } from '../formatters/createFormatter.js';
import type { CliValidateOptions } from '../types/CliValidateOptions.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <playbook>')
    .description('Validate a playbook without executing it')
    .option('-f, --format <format>', `Output format (${FORMATTER_TYPES.join('|')})`, 'human')
    .option('--verbose', 'Show stack traces for unexpected errors')
    .option('--no-color', 'Disable colored output')
    .action(async (playbookPath: string, options: CliValidateOptions) => {
      process.exitCode = await validatePlaybook(playbookPath, options);
    });
}

/**
 * @returns Process exit code
 */
export async function validatePlaybook(playbookPath: string, options: CliValidateOptions): Promise<ExitCode> {
  if (!isFormatterType(options.format)) {
    console.error(`Unknown output format "${options.format}". Valid formats: ${FORMATTER_TYPES.join(', ')}`);
    return ExitCode.CONFIGURATION_ERROR;
  }
  const formatter = createFormatter(options.format, { verbose: options.verbose, noColor: !options.color });

  try {
    const playbook = await PlaybookLoader.fromFile(playbookPath);
    formatter.showPlaybook(playbook, playbookPath);
    return ExitCode.SUCCESS;
  } catch (error) {
    formatter.showError(toError(error));
    return error instanceof PlaybookError ? error.exitCode : ExitCode.CONFIGURATION_ERROR;
  }
}
