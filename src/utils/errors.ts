import type { MigrationExecution } from '../executions/types.js';

export class MigrunError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MigrunError';
  }
}

export class ConfigurationError extends MigrunError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidVersionError extends MigrunError {
  constructor(version: unknown) {
    super(`Invalid migration version: ${String(version)}. Versions must be non-negative safe integers`);
    this.name = 'InvalidVersionError';
  }
}

export class DuplicateVersionError extends MigrunError {
  readonly version: number;

  constructor(version: number) {
    super(`Failed to register migration ${version}: the version is already registered`);
    this.name = 'DuplicateVersionError';
    this.version = version;
  }
}

/**
 * Registered migrations do not match the migration files found on disk
 */
export class RegistryStateError extends MigrunError {
  readonly missing: string[];
  readonly extra: string[];

  constructor(message: string, details?: { missing?: string[]; extra?: string[]; cause?: unknown }) {
    super(message, { cause: details?.cause });
    this.name = 'RegistryStateError';
    this.missing = details?.missing ?? [];
    this.extra = details?.extra ?? [];
  }
}

/**
 * The ledger holds executions for versions the registry does not know
 */
export class LedgerInconsistencyError extends MigrunError {
  readonly orphaned: number[];

  constructor(orphaned: number[]) {
    super(
      `Ledger has executions without a registered migration: ${orphaned.join(', ')}. ` +
      'Register the missing migrations or use force:up / force:down'
    );
    this.name = 'LedgerInconsistencyError';
    this.orphaned = orphaned;
  }
}

/**
 * A ledger scan stopped at a malformed record.
 * `partial` holds every record decoded before it.
 */
export class LedgerReadError extends MigrunError {
  readonly partial: MigrationExecution[];

  constructor(message: string, partial: MigrationExecution[], cause?: unknown) {
    super(message, { cause });
    this.name = 'LedgerReadError';
    this.partial = partial;
  }
}

export class MigrationNotFoundError extends MigrunError {
  readonly version: number;

  constructor(version: number) {
    super(`Migration not found: ${version}`);
    this.name = 'MigrationNotFoundError';
    this.version = version;
  }
}

export class InvalidStepsError extends MigrunError {
  constructor(steps: unknown) {
    super(`Invalid steps value: ${String(steps)}. Use a non-negative integer or "all"`);
    this.name = 'InvalidStepsError';
  }
}

export class LockedError extends MigrunError {
  readonly lockPath: string;

  constructor(lockPath: string, ownerPid?: number) {
    super(
      `Migrations are already running${ownerPid !== undefined ? ` (pid ${ownerPid})` : ''}. Lock file: ${lockPath}`
    );
    this.name = 'LockedError';
    this.lockPath = lockPath;
  }
}

/**
 * Extracts error message from unknown error type
 * @param error - The caught error (unknown type)
 * @returns Error message as string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
