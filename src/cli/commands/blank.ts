import { Command } from 'commander';
import chalk from 'chalk';
import { createBlankMigration } from '../../migrations/blank.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { CommandContext } from './context.js';

export function createBlankCommand(ctx: CommandContext, now?: () => number): Command {
  const command = new Command('blank');

  command
    .description('Create an empty migration file stamped with the current time')
    .action(async () => {
      if (!ctx.migrationsDir) {
        throw new ConfigurationError('No migrations directory configured');
      }

      const { version, filePath } = await createBlankMigration({
        dir: ctx.migrationsDir,
        naming: ctx.naming,
        now
      });

      ctx.output.log(`${chalk.green('✓')} Created ${filePath}`);
      ctx.output.log(chalk.dim(`Register Migration${version} in your registry before running migrations.`));
    });

  return command;
}
