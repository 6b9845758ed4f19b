import { Command } from 'commander';
import type { StepCount } from '../../migrations/types.js';
import { printRunReport } from '../reporter.js';
import { parseSteps, type CommandContext } from './context.js';

export function createUpCommand(ctx: CommandContext): Command {
  const command = new Command('up');

  command
    .description('Apply pending migrations, lowest version first')
    .option('-s, --steps <n|all>', 'How many migrations to apply', parseSteps, 'all')
    .action(async (options: { steps: StepCount }) => {
      const report = await ctx.withRunner(runner => runner.up(options.steps));
      if (!printRunReport(ctx.output, report)) {
        ctx.setExitCode(1);
      }
    });

  return command;
}
