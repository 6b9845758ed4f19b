import type { ExecutionRepository, MigrationExecution } from '../types.js';
import { decodeExecutions } from '../codec.js';
import { tableNameParts, toExecutionRecord } from './sql.js';
import { logger } from '../../utils/logger.js';

/**
 * Anything exposing pg's `query(text, values)`: a `pg.Pool`, a connected
 * `pg.Client`, or a pool client. Sharing the application's pool is preferred.
 */
export interface PostgresQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

/**
 * Quote a possibly schema-qualified table name (`schema.table`)
 */
export function quoteTableName(tableName: string): string {
  return tableNameParts(tableName).map(part => `"${part}"`).join('.');
}

/**
 * Ledger stored in a PostgreSQL table
 */
export class PostgresExecutionRepository implements ExecutionRepository {
  private readonly client: PostgresQueryable;
  private readonly table: string;

  constructor(client: PostgresQueryable, tableName = 'migration_executions') {
    this.client = client;
    this.table = quoteTableName(tableName);
  }

  async init(): Promise<void> {
    await this.client.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
        version BIGINT NOT NULL PRIMARY KEY,
        executed_at_ms BIGINT NOT NULL,
        finished_at_ms BIGINT NOT NULL
      )`
    );
    logger.debug(`[PostgresExecutionRepository] Ensured table ${this.table}`);
  }

  async loadExecutions(): Promise<MigrationExecution[]> {
    const { rows } = await this.client.query(
      `SELECT version, executed_at_ms, finished_at_ms FROM ${this.table}`
    );
    return decodeExecutions(rows.map(toExecutionRecord), this.table);
  }

  async save(execution: MigrationExecution): Promise<void> {
    await this.client.query(
      `INSERT INTO ${this.table} (version, executed_at_ms, finished_at_ms) VALUES ($1, $2, $3)
       ON CONFLICT (version) DO UPDATE SET
         executed_at_ms = EXCLUDED.executed_at_ms,
         finished_at_ms = EXCLUDED.finished_at_ms`,
      [execution.version, execution.executedAtMs, execution.finishedAtMs]
    );
  }

  async remove(execution: MigrationExecution): Promise<void> {
    await this.client.query(`DELETE FROM ${this.table} WHERE version = $1`, [execution.version]);
  }

  async findOne(version: number): Promise<MigrationExecution | null> {
    const { rows } = await this.client.query(
      `SELECT version, executed_at_ms, finished_at_ms FROM ${this.table} WHERE version = $1`,
      [version]
    );
    if (rows.length === 0) return null;
    const [execution] = decodeExecutions(rows.slice(0, 1).map(toExecutionRecord), this.table);
    return execution ?? null;
  }
}
