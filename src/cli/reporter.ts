import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { RunReport, StepEvent } from '../migrations/runner.js';

/**
 * Where CLI commands write their lines
 */
export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: CliOutput = {
  log: line => console.log(line),
  error: line => console.error(line)
};

const VERB = {
  up: { active: 'Applying', done: 'applied' },
  down: { active: 'Reverting', done: 'reverted' }
} as const;

/**
 * Build a runner progress callback: an ora spinner per step on a terminal,
 * plain lines otherwise
 */
export function createStepReporter(output: CliOutput, useSpinner: boolean): (event: StepEvent) => void {
  let spinner: Ora | null = null;

  return (event: StepEvent) => {
    const { version, description } = event.migration;
    const label = description ? `${version} ${chalk.dim(description)}` : String(version);

    switch (event.type) {
      case 'start': {
        const text = `${VERB[event.direction].active} ${label}${event.forced ? chalk.yellow(' (forced)') : ''}`;
        if (useSpinner) {
          spinner = ora(text).start();
        }
        break;
      }
      case 'success': {
        const duration = event.step.finishedAtMs - event.step.executedAtMs;
        const text = `${event.direction} ${label} ${chalk.dim(`(${duration}ms)`)}`;
        if (spinner) {
          spinner.succeed(text);
          spinner = null;
        } else {
          output.log(`${chalk.green('✓')} ${text}`);
        }
        break;
      }
      case 'failure': {
        const text = `${event.direction} ${label}: ${event.failure.error.message}`;
        if (spinner) {
          spinner.fail(chalk.red(text));
          spinner = null;
        } else {
          output.error(`${chalk.red('✗')} ${text}`);
        }
        break;
      }
    }
  };
}

/**
 * Print the outcome of a run
 * @returns Whether the run completed
 */
export function printRunReport(output: CliOutput, report: RunReport): boolean {
  const count = report.executed.length;
  const verb = VERB[report.direction].done;

  if (report.status === 'completed') {
    output.log(count === 0
      ? chalk.dim('Nothing to run')
      : chalk.dim(`→ ${count} migration(s) ${verb}`));
    return true;
  }

  const failure = report.failure;
  const where = failure
    ? `migration ${failure.version}${failure.phase === 'ledger' ? ' (saving the execution record)' : ''}`
    : 'an unknown step';
  output.error(chalk.red(`Run halted at ${where} after ${count} migration(s) ${verb}`));
  return false;
}
