import { Command } from 'commander';
import type { StepCount } from '../../migrations/types.js';
import { printRunReport } from '../reporter.js';
import { parseSteps, type CommandContext } from './context.js';

export function createDownCommand(ctx: CommandContext): Command {
  const command = new Command('down');

  command
    .description('Revert executed migrations, highest version first')
    .option('-s, --steps <n|all>', 'How many migrations to revert', parseSteps, 1)
    .action(async (options: { steps: StepCount }) => {
      const report = await ctx.withRunner(runner => runner.down(options.steps));
      if (!printRunReport(ctx.output, report)) {
        ctx.setExitCode(1);
      }
    });

  return command;
}
