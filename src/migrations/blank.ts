import * as fs from 'fs/promises';
import * as path from 'path';
import { DEFAULT_NAMING, migrationFileName, type MigrationFileNaming } from './naming.js';
import { MigrunError } from '../utils/errors.js';

export interface BlankMigrationOptions {
  dir: string;
  naming?: MigrationFileNaming;

  /** Clock in ms since epoch; the version is its value in whole seconds */
  now?: () => number;
}

export interface BlankMigration {
  version: number;
  filePath: string;
}

export function renderBlankMigration(version: number): string {
  return `import type { Migration, MigrationContext } from 'migrun';

export class Migration${version} implements Migration {
  readonly version = ${version};
  readonly description = '';

  async up(context: MigrationContext): Promise<void> {
    context.logger.debug('Applying migration ${version}');
  }

  async down(context: MigrationContext): Promise<void> {
    context.logger.debug('Reverting migration ${version}');
  }
}
`;
}

/**
 * Scaffold a migration file stamped with the current unix time.
 * Register the generated class in the registry module afterwards.
 */
export async function createBlankMigration(options: BlankMigrationOptions): Promise<BlankMigration> {
  const naming = options.naming ?? DEFAULT_NAMING;
  const now = options.now ?? Date.now;
  const version = Math.floor(now() / 1000);
  const filePath = path.join(options.dir, migrationFileName(version, naming));

  await fs.mkdir(options.dir, { recursive: true });
  try {
    await fs.writeFile(filePath, renderBlankMigration(version), { encoding: 'utf-8', flag: 'wx' });
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      throw new MigrunError(`Migration file already exists: ${filePath}`, { cause: error });
    }
    throw error;
  }

  return { version, filePath };
}
