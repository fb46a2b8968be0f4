#!/usr/bin/env node
/**
 * Restplay CLI
 *
 * Usage:
 *   restplay run <playbook>        Execute a playbook
 *   restplay validate <playbook>   Validate a playbook
 *   restplay --version             Show version
 */

import { Command } from 'commander';
import { errorMessage, ExitCode } from '@restplay/engine';
import { registerRunCommand } from './commands/run.js';
import { registerValidateCommand } from './commands/validate.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('restplay')
    .description('Run declarative multi-phase HTTP playbooks')
    .version(VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  registerRunCommand(program);
  registerValidateCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', errorMessage(error));
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(ExitCode.EXECUTION_FAILED);
});
