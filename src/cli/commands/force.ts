import { Command } from 'commander';
import chalk from 'chalk';
import type { Direction } from '../../migrations/types.js';
import { printRunReport } from '../reporter.js';
import { parseVersion, type CommandContext } from './context.js';

/**
 * force:up / force:down skip the ledger consistency check and run one
 * version unconditionally
 */
export function createForceCommand(ctx: CommandContext, direction: Direction): Command {
  const command = new Command(`force:${direction}`);
  const effect = direction === 'up'
    ? 'Can apply a migration that is already applied.'
    : 'Can revert a migration that was never applied.';

  command
    .description(`Run ${direction}() for one version regardless of recorded state. ${effect}`)
    .requiredOption('-v, --version <version>', 'Migration version', parseVersion)
    .action(async (options: { version: number }) => {
      const report = await ctx.withRunner(runner => {
        ctx.output.log(chalk.yellow(`Forcing ${direction} for migration ${options.version}`));
        return direction === 'up'
          ? runner.forceUp(options.version)
          : runner.forceDown(options.version);
      });

      if (!printRunReport(ctx.output, report)) {
        ctx.setExitCode(1);
      }
    });

  return command;
}
