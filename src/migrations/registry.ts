import type { Migration } from './types.js';
import { DuplicateVersionError, InvalidVersionError } from '../utils/errors.js';

export function isValidVersion(version: unknown): version is number {
  return typeof version === 'number' && Number.isSafeInteger(version) && version >= 0;
}

/**
 * Central migration registry
 * Stores registered migrations keyed by version. Built once at startup by the
 * host's composition point; there is no removal.
 */
export class MigrationRegistry {
  protected readonly migrations = new Map<number, Migration>();

  /**
   * Register a migration
   * Throws DuplicateVersionError instead of overwriting an existing version
   */
  register(migration: Migration): this {
    if (!isValidVersion(migration.version)) {
      throw new InvalidVersionError(migration.version);
    }
    if (this.migrations.has(migration.version)) {
      throw new DuplicateVersionError(migration.version);
    }

    this.migrations.set(migration.version, migration);
    return this;
  }

  /**
   * Register multiple migrations, stopping at the first failure
   */
  registerAll(migrations: Iterable<Migration>): this {
    for (const migration of migrations) {
      this.register(migration);
    }
    return this;
  }

  /**
   * All registered versions, ascending
   */
  orderedVersions(): number[] {
    return [...this.migrations.keys()].sort((a, b) => a - b);
  }

  /**
   * All registered migrations sorted by version, ascending
   */
  orderedMigrations(): Migration[] {
    return [...this.migrations.values()].sort((a, b) => a.version - b.version);
  }

  get(version: number): Migration | undefined {
    return this.migrations.get(version);
  }

  has(version: number): boolean {
    return this.migrations.has(version);
  }

  count(): number {
    return this.migrations.size;
  }
}
