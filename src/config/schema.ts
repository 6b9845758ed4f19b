/**
 * Configuration schema for migrun
 */

import { tmpdir } from 'os';
import { z } from 'zod';
import type { MigrationFileNaming } from '../migrations/naming.js';

export const namingSchema = z.object({
  prefix: z.string().min(1).default('version'),
  separator: z.string().default('_'),
  suffix: z.string().min(1).default('.ts')
});

export const fileLedgerSchema = z.object({
  driver: z.literal('file'),
  path: z.string().min(1).default('./migrations/executions.json')
});

export const postgresLedgerSchema = z.object({
  driver: z.literal('postgres'),
  connectionString: z.string().min(1),
  table: z.string().min(1).default('migration_executions')
});

export const mysqlLedgerSchema = z.object({
  driver: z.literal('mysql'),
  connectionString: z.string().min(1),
  table: z.string().min(1).default('migration_executions')
});

export const ledgerSchema = z.discriminatedUnion('driver', [fileLedgerSchema, postgresLedgerSchema, mysqlLedgerSchema]);

export const lockSchema = z.object({
  /** Take the process lock around every command */
  exclusive: z.boolean().default(false),
  dir: z.string().min(1).default(tmpdir()),
  name: z.string().regex(/^[\w.-]+$/, 'may only contain letters, digits, "_", "-" and "."').default('migrun')
});

export const configSchema = z.object({
  migrationsDir: z.string().min(1).default('./migrations'),
  /** Module exporting `migrations: Migration[]`; defaults to `<migrationsDir>/index.js` */
  registry: z.string().min(1).optional(),
  naming: namingSchema.default({}),
  ledger: ledgerSchema.default({ driver: 'file' }),
  lock: lockSchema.default({})
});

/**
 * Shape accepted in migrun.config.json: every key optional, no defaults applied
 */
export const fileConfigSchema = z
  .object({
    migrationsDir: z.string().optional(),
    registry: z.string().optional(),
    naming: namingSchema.partial().optional(),
    ledger: ledgerSchema.optional(),
    lock: lockSchema.partial().optional()
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;
export type LedgerConfig = z.infer<typeof ledgerSchema>;
export type LockConfig = z.infer<typeof lockSchema>;

/**
 * Resolved runtime configuration; every path is absolute
 */
export interface MigrunConfig {
  migrationsDir: string;
  registry: string;
  naming: MigrationFileNaming;
  ledger: LedgerConfig;
  lock: LockConfig;
  /** Config file that was read, if any */
  source: string | null;
}
