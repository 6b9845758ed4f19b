/**
 * Execution ledger types
 */

import { z } from 'zod';

/**
 * One completed application of a migration
 */
export interface MigrationExecution {
  version: number;

  /** Step start time, ms since epoch */
  executedAtMs: number;

  /** Step completion time, ms since epoch; never before executedAtMs */
  finishedAtMs: number;
}

// Only numbers and digit strings; null, booleans and empty strings are malformed
const msSchema = z
  .union([z.number(), z.string().regex(/^\d+$/, 'must be a decimal integer')])
  .pipe(z.coerce.number().int().nonnegative().refine(Number.isSafeInteger, 'must be a safe integer'));

/**
 * Decodes a stored record. Digit strings are accepted since SQL BIGINT
 * columns may arrive as strings.
 */
export const migrationExecutionSchema = z
  .object({
    version: msSchema,
    executedAtMs: msSchema,
    finishedAtMs: msSchema
  })
  .refine(e => e.executedAtMs <= e.finishedAtMs, {
    message: 'executedAtMs must not be after finishedAtMs',
    path: ['finishedAtMs']
  });

/**
 * Persistence contract for the execution ledger.
 * Any failure rejects; the runner treats it as fatal to the current step.
 */
export interface ExecutionRepository {
  /** Create the storage if needed. Idempotent */
  init(): Promise<void>;

  /**
   * All persisted executions, in no particular order.
   * Rejects with LedgerReadError (carrying the records decoded so far) on a malformed record.
   */
  loadExecutions(): Promise<MigrationExecution[]>;

  /** Insert, or update the timestamps of an existing record for the version */
  save(execution: MigrationExecution): Promise<void>;

  /** Delete the record for the version. Removing a missing record is not an error */
  remove(execution: MigrationExecution): Promise<void>;

  findOne(version: number): Promise<MigrationExecution | null>;
}
