import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import type { MigrationRegistry } from '../migrations/registry.js';
import { DirMigrationsRegistry } from '../migrations/dir-registry.js';
import { MigrationRunner } from '../migrations/runner.js';
import { DEFAULT_NAMING, type MigrationFileNaming } from '../migrations/naming.js';
import type { ExecutionRepository } from '../executions/types.js';
import { ProcessLock } from '../lock/process-lock.js';
import { getErrorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type MigrunLogger } from '../utils/logger.js';
import { consoleOutput, createStepReporter, type CliOutput } from './reporter.js';
import type { CommandContext } from './commands/context.js';
import { createUpCommand } from './commands/up.js';
import { createDownCommand } from './commands/down.js';
import { createForceCommand } from './commands/force.js';
import { createStatsCommand } from './commands/stats.js';
import { createBlankCommand } from './commands/blank.js';

export interface BootstrapSettings {
  /** Hold a host-local lock for the whole command */
  runExclusively: boolean;
  lockDir: string;
  lockName: string;
}

export interface BootstrapOptions {
  /** Arguments after the executable and script, e.g. `['up', '--steps', '2']` */
  argv: string[];
  registry: MigrationRegistry;
  repository: ExecutionRepository;
  migrationsDir?: string;
  naming?: MigrationFileNaming;
  settings?: BootstrapSettings;
  output?: CliOutput;
  /** Show an ora spinner per step; defaults to whether stderr is a terminal */
  spinner?: boolean;
  signal?: AbortSignal;
  now?: () => number;
  version?: string;
  /** Logger for the runner and the lock; defaults to the migrun logger */
  logger?: MigrunLogger;
}

/**
 * Build the migrun program around a host-supplied registry and ledger
 */
export function createProgram(options: BootstrapOptions, setExitCode: (code: number) => void): Command {
  const output = options.output ?? consoleOutput;
  const useSpinner = options.spinner ?? Boolean(process.stderr.isTTY);
  const logger = options.logger ?? defaultLogger;
  let prepared: Promise<void> | null = null;

  // Initialize the ledger and validate the registry, once per program
  const prepare = (): Promise<void> => {
    if (!prepared) {
      prepared = (async () => {
        await options.repository.init();
        if (options.registry instanceof DirMigrationsRegistry) {
          await options.registry.assertValidRegistry();
        }
      })();
    }
    return prepared;
  };

  const ctx: CommandContext = {
    registry: options.registry,
    repository: options.repository,
    output,
    naming: options.naming ?? (options.registry instanceof DirMigrationsRegistry ? options.registry.naming : DEFAULT_NAMING),
    migrationsDir: options.migrationsDir ?? (options.registry instanceof DirMigrationsRegistry ? options.registry.dirPath : undefined),
    setExitCode,
    withRunner<T>(task: (runner: MigrationRunner) => Promise<T>): Promise<T> {
      const settings = options.settings;
      const lock = settings?.runExclusively
        ? new ProcessLock({ dir: settings.lockDir, name: settings.lockName, logger })
        : null;
      const run = async (): Promise<T> => {
        await prepare();
        // The lock is already held here, so the runner does not take it again
        return task(new MigrationRunner(options.registry, options.repository, {
          logger,
          signal: options.signal,
          now: options.now,
          onStep: createStepReporter(output, useSpinner)
        }));
      };
      return lock ? lock.withLock(run) : run();
    }
  };

  const program = new Command();

  program
    .name('migrun')
    .description('Apply and revert versioned migrations')
    .version(options.version ?? '1.0.0')
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: str => output.log(str.trimEnd()),
      writeErr: str => output.error(str.trimEnd())
    });

  program.addCommand(createUpCommand(ctx));
  program.addCommand(createDownCommand(ctx));
  program.addCommand(createForceCommand(ctx, 'up'));
  program.addCommand(createForceCommand(ctx, 'down'));
  program.addCommand(createStatsCommand(ctx));
  program.addCommand(createBlankCommand(ctx, options.now));

  // addCommand() does not pass on exitOverride() and configureOutput()
  for (const command of program.commands) {
    command.copyInheritedSettings(program);
  }

  return program;
}

/**
 * Run one migrun command for a host application.
 * Returns the process exit status: non-zero on a halted run or any fatal error.
 */
export async function bootstrap(options: BootstrapOptions): Promise<number> {
  let exitCode = 0;
  const program = createProgram(options, code => {
    exitCode = code;
  });
  const output = options.output ?? consoleOutput;

  if (options.argv.length === 0) {
    program.outputHelp();
    return 0;
  }

  try {
    await program.parseAsync(options.argv, { from: 'user' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // Usage errors and --help/--version; commander already printed the message
      return error.exitCode;
    }
    output.error(chalk.red(`✗ ${getErrorMessage(error)}`));
    (options.logger ?? defaultLogger).debug('[bootstrap] Command failed', error instanceof Error ? error.stack : error);
    return 1;
  }

  return exitCode;
}
