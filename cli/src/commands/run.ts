/**
 * Run Command
 *
 * Loads a playbook, runs it and displays progress through the selected
 * formatter. On SIGINT/SIGTERM the engine is asked to stop; in-flight
 * requests get up to the playbook's `shutdown_timeout` to finish before
 * the process exits anyway. The checkpoint survives a stopped run.
 *
 * With `--cron` the playbook is loaded once and run on every match of the
 * expression until a signal arrives; a failed run is reported and the
 * schedule carries on. A path of `-` reads the playbook from stdin.
 *
 * Usage:
 *   restplay run playbook.yaml
 *   restplay run playbook.yaml --sessions sessions.json
 *   restplay run playbook.yaml --no-resume --format json
 *   restplay run playbook.yaml --cron "0 * * * *"
 *   cat playbook.yaml | restplay run -
 *
 * Exit codes:
 *   0   - Playbook completed
 *   1   - Execution failed
 *   2   - Configuration error (playbook, sessions file, options)
 *   130 - Stopped by a signal
 */

import type { Command } from 'commander';
import {
  ConfigurationError,
  CronScheduler,
  ExitCode,
  PlaybookError,
  PlaybookExecutionEngine,
  PlaybookLoader,
  ShutdownManager,
  StaticSessionProvider,
  createAuthenticators,
  createEngineLogger,
  parseLogLevel,
  toError,
  type AuthenticatorFactory,
  type CronTaskFactory,
  type EngineLogger,
  type PlaybookConfig,
  type SessionProvider,
  type SleepFn,
  type TransportFactory,
} from '@restplay/engine';
import { createFormatter, FORMATTER_TYPES, isFormatterType } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliRunOptions } from '../types/CliRunOptions.js';

/**
 * Where a `-` playbook path reads from
 */
export type PlaybookInput = AsyncIterable<string | Buffer> & { isTTY?: boolean };

/**
 * Seams for tests; the command itself passes none
 */
export interface RunDependencies {
  transportFactory?: TransportFactory;
  sleep?: SleepFn;
  /** Default true */
  installSignalHandlers?: boolean;
  /** Default process.stdin */
  stdin?: PlaybookInput;
  /** Replaces node-cron under `--cron` */
  createCronTask?: CronTaskFactory;
  /** Aborting it ends a `--cron` schedule, like a signal would */
  signal?: AbortSignal;
}

interface RunContext {
  playbook: PlaybookConfig;
  sessions: SessionProvider;
  authenticators: Readonly<Record<string, AuthenticatorFactory>>;
  formatter: Formatter;
  logger: EngineLogger;
  deps: RunDependencies;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run <playbook>')
    .description('Execute a playbook ("-" reads it from stdin)')
    .option('--no-resume', 'Do not load or write checkpoints for this run')
    .option('-s, --sessions <file>', 'JSON/YAML file mapping session names to session configs')
    .option('-f, --format <format>', `Output format (${FORMATTER_TYPES.join('|')})`, 'human')
    .option('-l, --log-level <level>', 'Engine log level (debug|info|warn|error|fatal|silent)', 'warn')
    .option('--cron <expression>', 'Run on a cron schedule until interrupted')
    .option('--verbose', 'Show detailed output')
    .option('--no-color', 'Disable colored output')
    .action(async (playbookPath: string, options: CliRunOptions) => {
      process.exitCode = await runPlaybook(playbookPath, options);
    });
}

/**
 * Run command handler
 *
 * @returns Process exit code
 */
export async function runPlaybook(
  playbookPath: string,
  options: CliRunOptions,
  deps: RunDependencies = {}
): Promise<ExitCode> {
  if (!isFormatterType(options.format)) {
    console.error(`Unknown output format "${options.format}". Valid formats: ${FORMATTER_TYPES.join(', ')}`);
    return ExitCode.CONFIGURATION_ERROR;
  }
  const formatter = createFormatter(options.format, { verbose: options.verbose, noColor: !options.color });

  const level = parseLogLevel(options.logLevel);
  if (level === undefined) {
    formatter.showError(
      new ConfigurationError({ message: `Unknown log level "${options.logLevel}"`, path: '--log-level' })
    );
    return ExitCode.CONFIGURATION_ERROR;
  }
  // stdout belongs to the formatter
  const logger = createEngineLogger(level, {
    verbose: options.verbose,
    colors: options.color,
    json: options.format === 'json',
    sink: (line) => console.error(line),
  });

  try {
    if (options.cron !== undefined) {
      CronScheduler.assertValid(options.cron);
    }
    const playbook = withResume(await loadPlaybook(playbookPath, deps.stdin ?? process.stdin), options.resume);
    const authenticators = createAuthenticators({ transportFactory: deps.transportFactory });
    const sessions = options.sessions
      ? StaticSessionProvider.fromConfigs(await PlaybookLoader.sessionsFromFile(options.sessions), { authenticators })
      : new StaticSessionProvider();

    const context: RunContext = { playbook, sessions, authenticators, formatter, logger, deps };
    return options.cron !== undefined ? await runScheduled(options.cron, context) : await runOnce(context);
  } catch (error) {
    formatter.showError(toError(error));
    return error instanceof PlaybookError ? error.exitCode : ExitCode.EXECUTION_FAILED;
  }
}

async function runOnce(context: RunContext): Promise<ExitCode> {
  const engine = createEngine(context);
  const run = engine.execute(context.playbook, context.sessions);
  const settled = run.then(
    () => undefined,
    () => undefined
  );

  const removeSignalHandlers = installStopHandlers(context, () => settled, (signal) => {
    engine.requestStop(`received ${signal}`);
  });
  try {
    context.formatter.showResult(await run);
    return ExitCode.SUCCESS;
  } finally {
    removeSignalHandlers();
  }
}

/**
 * Runs until a signal or `deps.signal` ends the schedule, then waits for
 * the run in progress
 */
async function runScheduled(expression: string, context: RunContext): Promise<ExitCode> {
  const { playbook, sessions, formatter, logger, deps } = context;
  let engine: PlaybookExecutionEngine | undefined;

  const scheduler = new CronScheduler(
    expression,
    async () => {
      engine = createEngine(context);
      try {
        formatter.showResult(await engine.execute(playbook, sessions));
      } finally {
        engine = undefined;
      }
    },
    {
      logger: logger.child('scheduler'),
      createTask: deps.createCronTask,
      listeners: { onExecutionFailed: (_, error) => formatter.showError(error) },
    }
  );

  const stop = new AbortController();
  if (deps.signal?.aborted) {
    stop.abort();
  }
  deps.signal?.addEventListener('abort', () => stop.abort(), { once: true });

  const removeSignalHandlers = installStopHandlers(context, () => scheduler.stop(), (signal) => {
    engine?.requestStop(`received ${signal}`);
    stop.abort();
  });
  try {
    scheduler.start();
    await new Promise<void>((resolve) => {
      if (stop.signal.aborted) {
        resolve();
        return;
      }
      stop.signal.addEventListener('abort', () => resolve(), { once: true });
    });
    await scheduler.stop();
    return ExitCode.SUCCESS;
  } finally {
    removeSignalHandlers();
  }
}

function createEngine({ logger, formatter, authenticators, deps }: RunContext): PlaybookExecutionEngine {
  return new PlaybookExecutionEngine({
    logger,
    observers: [formatter],
    authenticators,
    transportFactory: deps.transportFactory,
    sleep: deps.sleep,
  });
}

/**
 * On SIGINT/SIGTERM: call `onStop`, then give `settle` up to the
 * playbook's shutdown timeout before exiting with 130
 *
 * @returns Function removing the handlers
 */
function installStopHandlers(
  { playbook, formatter, logger, deps }: RunContext,
  settle: () => Promise<void>,
  onStop: (signal: NodeJS.Signals) => void
): () => void {
  if (deps.installSignalHandlers === false) {
    return () => {};
  }
  const shutdown = new ShutdownManager(logger.child('shutdown'));
  shutdown.registerHandler('engine', settle);
  return ShutdownManager.setupSignalHandlers((signal) => {
    formatter.showWarning(`Received ${signal}, waiting up to ${playbook.shutdownTimeout}s for in-flight requests`);
    onStop(signal);
    void shutdown.executeHandlers(playbook.shutdownTimeout * 1000).then((report) => {
      if (report.timedOut.length > 0) {
        process.exit(ExitCode.CANCELLED);
      }
    });
  });
}

async function loadPlaybook(playbookPath: string, stdin: PlaybookInput): Promise<PlaybookConfig> {
  if (playbookPath !== '-') {
    return PlaybookLoader.fromFile(playbookPath);
  }
  if (stdin.isTTY) {
    throw new ConfigurationError({
      message: 'No playbook on stdin: pipe YAML content or pass a playbook file',
      path: '<playbook>',
    });
  }
  return PlaybookLoader.fromStream(stdin);
}

/**
 * `--no-resume` turns incremental execution off for this run only
 */
function withResume(playbook: PlaybookConfig, resume: boolean): PlaybookConfig {
  if (resume || !playbook.incremental.enabled) {
    return playbook;
  }
  return { ...playbook, incremental: { ...playbook.incremental, enabled: false } };
}
