import { migrationExecutionSchema, type MigrationExecution } from './types.js';
import { LedgerReadError } from '../utils/errors.js';

/**
 * Decode raw ledger records in order.
 * Stops at the first malformed record and throws LedgerReadError with the
 * records decoded before it.
 */
export function decodeExecutions(records: readonly unknown[], source: string): MigrationExecution[] {
  const decoded: MigrationExecution[] = [];

  for (const [index, record] of records.entries()) {
    const parsed = migrationExecutionSchema.safeParse(record);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`)
        .join('; ');
      throw new LedgerReadError(
        `Malformed execution record #${index} in ${source}: ${issues}`,
        decoded,
        parsed.error
      );
    }
    decoded.push(parsed.data);
  }

  return decoded;
}
