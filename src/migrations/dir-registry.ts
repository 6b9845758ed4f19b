import { promises as fs, type Dirent } from 'fs';
import type { Migration, RegistryValidation } from './types.js';
import { MigrationRegistry } from './registry.js';
import { DEFAULT_NAMING, migrationFileName, parseMigrationFileName, type MigrationFileNaming } from './naming.js';
import { RegistryStateError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Registry backed by a directory of migration files.
 * Every file following the naming convention must have a registered
 * migration, and every registered migration must have a file.
 */
export class DirMigrationsRegistry extends MigrationRegistry {
  readonly dirPath: string;
  readonly naming: MigrationFileNaming;

  constructor(dirPath: string, naming: MigrationFileNaming = DEFAULT_NAMING) {
    super();
    this.dirPath = dirPath;
    this.naming = naming;
  }

  /**
   * Build a registry holding `migrations` and assert it matches the directory
   */
  static async create(
    dirPath: string,
    migrations: Iterable<Migration>,
    naming: MigrationFileNaming = DEFAULT_NAMING
  ): Promise<DirMigrationsRegistry> {
    const registry = new DirMigrationsRegistry(dirPath, naming);
    registry.registerAll(migrations);
    await registry.assertValidRegistry();
    return registry;
  }

  /**
   * Compare registered versions with the versions declared by files.
   * Both lists are ascending; files not following the convention are ignored.
   */
  async hasAllMigrationsRegistered(): Promise<RegistryValidation> {
    const declared = await this.readDeclaredVersions();
    const remaining = new Set(this.migrations.keys());
    const missing: number[] = [];

    for (const version of declared) {
      if (!remaining.delete(version)) {
        missing.push(version);
      }
    }

    const extra = [...remaining];
    missing.sort((a, b) => a - b);
    extra.sort((a, b) => a - b);

    return {
      allRegistered: missing.length === 0 && extra.length === 0,
      missing,
      extra
    };
  }

  /**
   * Throws RegistryStateError listing unregistered and extra migration files
   */
  async assertValidRegistry(): Promise<void> {
    const { allRegistered, missing, extra } = await this.hasAllMigrationsRegistered();
    if (allRegistered) {
      logger.debug(`[DirMigrationsRegistry] ${this.count()} migration(s) match ${this.dirPath}`);
      return;
    }

    const missingFiles = missing.map(v => migrationFileName(v, this.naming));
    const extraFiles = extra.map(v => migrationFileName(v, this.naming));

    throw new RegistryStateError(
      'Registry has invalid state. You must register all migrations before running migrations. ' +
      `Not registered: ${missingFiles.join(', ') || 'none'}. ` +
      `Extra migrations: ${extraFiles.join(', ') || 'none'}`,
      { missing: missingFiles, extra: extraFiles }
    );
  }

  private async readDeclaredVersions(): Promise<Set<number>> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.dirPath, { withFileTypes: true });
    } catch (error: unknown) {
      throw new RegistryStateError(
        `Failed to check if all migrations have been registered. Reading ${this.dirPath} failed: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }

    const versions = new Set<number>();
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const version = parseMigrationFileName(entry.name, this.naming);
      if (version !== null) {
        versions.add(version);
      }
    }
    return versions;
  }
}
