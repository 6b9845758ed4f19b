/**
 * Migration system public API
 *
 * A host builds the registry in one place from an explicit list of migration
 * instances:
 *
 * ```typescript
 * import { DirMigrationsRegistry } from 'migrun';
 * import { Migration1712953077 } from './migrations/version_1712953077.js';
 *
 * const registry = await DirMigrationsRegistry.create('./migrations', [
 *   new Migration1712953077(db),
 * ]);
 * ```
 */

export { MigrationRegistry, isValidVersion } from './registry.js';
export { DirMigrationsRegistry } from './dir-registry.js';
export { MigrationRunner, normalizeSteps } from './runner.js';
export { reconcile, assertConsistent } from './reconciler.js';
export { createBlankMigration, renderBlankMigration } from './blank.js';
export { DEFAULT_NAMING, migrationFileName, parseMigrationFileName } from './naming.js';
export type {
  Migration,
  MigrationContext,
  MigrationResult,
  RegistryValidation,
  Direction,
  StepCount
} from './types.js';
export type { MigrationFileNaming } from './naming.js';
export type { ReconciliationPlan } from './reconciler.js';
export type {
  RunnerState,
  RunReport,
  StepReport,
  StepFailure,
  StepEvent,
  MigrationStats,
  MigrationRunnerOptions
} from './runner.js';
export type { BlankMigration, BlankMigrationOptions } from './blank.js';
