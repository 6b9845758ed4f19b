import type { Migration } from './types.js';
import type { MigrationExecution } from '../executions/types.js';
import { LedgerInconsistencyError } from '../utils/errors.js';

/**
 * Difference between registered migrations and the execution ledger
 */
export interface ReconciliationPlan {
  /** Registered but not executed, ascending */
  pendingUp: Migration[];

  /** Executed and registered, descending (last applied reverts first) */
  pendingDown: Migration[];

  /** Executions with no registered migration, ascending by version */
  orphaned: MigrationExecution[];

  consistent: boolean;
}

export function reconcile(
  migrations: readonly Migration[],
  executions: readonly MigrationExecution[]
): ReconciliationPlan {
  const executed = new Map<number, MigrationExecution>();
  for (const execution of executions) {
    executed.set(execution.version, execution);
  }

  const ordered = [...migrations].sort((a, b) => a.version - b.version);
  const registered = new Set(ordered.map(m => m.version));

  const pendingUp = ordered.filter(m => !executed.has(m.version));
  const pendingDown = ordered.filter(m => executed.has(m.version)).reverse();
  const orphaned = [...executed.values()]
    .filter(e => !registered.has(e.version))
    .sort((a, b) => a.version - b.version);

  return {
    pendingUp,
    pendingDown,
    orphaned,
    consistent: orphaned.length === 0
  };
}

/**
 * Ordered runs cannot proceed past executions whose migration is unknown
 */
export function assertConsistent(plan: ReconciliationPlan): void {
  if (!plan.consistent) {
    throw new LedgerInconsistencyError(plan.orphaned.map(e => e.version));
  }
}
