import { InvalidArgumentError } from 'commander';
import type { MigrationRegistry } from '../../migrations/registry.js';
import type { MigrationRunner } from '../../migrations/runner.js';
import type { MigrationFileNaming } from '../../migrations/naming.js';
import type { ExecutionRepository } from '../../executions/types.js';
import type { StepCount } from '../../migrations/types.js';
import type { CliOutput } from '../reporter.js';

/**
 * What every command needs from the bootstrap
 */
export interface CommandContext {
  registry: MigrationRegistry;
  repository: ExecutionRepository;
  output: CliOutput;
  naming: MigrationFileNaming;

  /** Where `blank` writes new files; unset when the host has no migrations directory */
  migrationsDir?: string;

  /**
   * Run `task` against a fresh runner. Holds the process lock, when the host
   * runs exclusively, from before the ledger is initialized until `task` settles.
   */
  withRunner<T>(task: (runner: MigrationRunner) => Promise<T>): Promise<T>;

  /** Mark the process as failed without throwing */
  setExitCode(code: number): void;
}

export function parseSteps(value: string): StepCount {
  if (value === 'all') return 'all';
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer or "all".');
  }
  const steps = Number(value);
  if (!Number.isSafeInteger(steps)) {
    throw new InvalidArgumentError('Step count is too large.');
  }
  return steps;
}

export function parseVersion(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer version.');
  }
  const version = Number(value);
  if (!Number.isSafeInteger(version)) {
    throw new InvalidArgumentError('Version is too large.');
  }
  return version;
}
