import type { ExecutionRepository, MigrationExecution } from '../types.js';

/**
 * In-process ledger. Useful for embedding and for tests; nothing survives the process.
 */
export class MemoryExecutionRepository implements ExecutionRepository {
  private readonly executions = new Map<number, MigrationExecution>();

  constructor(initial: Iterable<MigrationExecution> = []) {
    for (const execution of initial) {
      this.executions.set(execution.version, { ...execution });
    }
  }

  async init(): Promise<void> {
    // Nothing to create
  }

  async loadExecutions(): Promise<MigrationExecution[]> {
    return [...this.executions.values()].map(e => ({ ...e }));
  }

  async save(execution: MigrationExecution): Promise<void> {
    this.executions.set(execution.version, { ...execution });
  }

  async remove(execution: MigrationExecution): Promise<void> {
    this.executions.delete(execution.version);
  }

  async findOne(version: number): Promise<MigrationExecution | null> {
    const found = this.executions.get(version);
    return found ? { ...found } : null;
  }
}
