/**
 * Migration system types
 */

import type { MigrunLogger } from '../utils/logger.js';

/**
 * Context handed to every up()/down() call
 */
export interface MigrationContext {
  /** Cancellation forwarded from the caller; an abort surfaces as a step failure */
  signal?: AbortSignal;

  logger: MigrunLogger;
}

/**
 * Migration interface
 * Each migration implements this interface
 */
export interface Migration {
  /** Unique, immutable version (conventionally unix seconds, e.g. 1712953077) */
  readonly version: number;

  /** Human-readable description */
  readonly description?: string;

  /** Apply the migration */
  up(context: MigrationContext): Promise<MigrationResult | void>;

  /** Revert the migration */
  down(context: MigrationContext): Promise<MigrationResult | void>;
}

/**
 * Migration execution result.
 * Resolving nothing counts as success; throwing counts as failure.
 */
export interface MigrationResult {
  success: boolean;

  /** Reason for failure */
  reason?: string;

  details?: Record<string, unknown>;
}

/**
 * Outcome of comparing registered versions with migration files on disk
 */
export interface RegistryValidation {
  allRegistered: boolean;

  /** Declared by a file but not registered */
  missing: number[];

  /** Registered but without a file */
  extra: number[];
}

export type Direction = 'up' | 'down';

/** Number of migrations to run, or every pending one */
export type StepCount = number | 'all';
