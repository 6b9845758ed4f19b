import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import type { MigrationStats } from '../../migrations/runner.js';
import type { CommandContext } from './context.js';

export function renderStatsTable(stats: MigrationStats): string {
  const table = new Table({
    head: [chalk.cyan('Metric'), chalk.cyan('Value')],
    style: {
      head: [],
      border: ['grey']
    },
    colWidths: [25, 40]
  });

  const last = stats.lastExecuted
    ? `${stats.lastExecuted.version} at ${new Date(stats.lastExecuted.finishedAtMs).toISOString()}`
    : 'none';

  table.push(
    [chalk.white('Registered'), chalk.white(String(stats.registered))],
    [chalk.white('Executed'), chalk.white(String(stats.executed))],
    [chalk.white('Pending up'), chalk.white(String(stats.pendingUp))],
    [chalk.white('Pending down'), chalk.white(String(stats.pendingDown))],
    [chalk.white('Last executed'), chalk.white(last)],
    [
      chalk.white('Consistent'),
      stats.consistent ? chalk.green('yes') : chalk.red('no')
    ]
  );

  return table.toString();
}

export function createStatsCommand(ctx: CommandContext): Command {
  const command = new Command('stats');

  command
    .description('Show registered, executed and pending migrations')
    .action(async () => {
      const stats = await ctx.withRunner(runner => runner.stats());

      ctx.output.log(renderStatsTable(stats));

      if (!stats.consistent) {
        ctx.output.error(chalk.red(
          `Executions without a registered migration: ${stats.orphaned.join(', ')}. ` +
          'Ordered up/down will refuse to run until this is resolved.'
        ));
        ctx.setExitCode(1);
      }
    });

  return command;
}
