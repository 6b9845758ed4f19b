import type { ExecutionRepository, MigrationExecution } from '../types.js';
import { decodeExecutions } from '../codec.js';
import { tableNameParts, toExecutionRecord } from './sql.js';
import { LedgerReadError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Anything exposing mysql2/promise's `query(sql, values)`: a `Pool`, a
 * `Connection` or a `PoolConnection`. Resolves to `[rows, fields]`.
 */
export interface MysqlQueryable {
  query(sql: string, values?: unknown[]): Promise<[unknown, unknown]>;
}

/**
 * Backtick-quote a possibly database-qualified table name (`db.table`)
 */
export function quoteMysqlTableName(tableName: string): string {
  return tableNameParts(tableName).map(part => `\`${part}\``).join('.');
}

/**
 * Ledger stored in a MySQL (InnoDB) table
 */
export class MysqlExecutionRepository implements ExecutionRepository {
  private readonly client: MysqlQueryable;
  private readonly table: string;

  constructor(client: MysqlQueryable, tableName = 'migration_executions') {
    this.client = client;
    this.table = quoteMysqlTableName(tableName);
  }

  async init(): Promise<void> {
    await this.client.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
        \`version\` BIGINT UNSIGNED NOT NULL,
        \`executed_at_ms\` BIGINT UNSIGNED NOT NULL,
        \`finished_at_ms\` BIGINT UNSIGNED NOT NULL,
        PRIMARY KEY (\`version\`)
      ) ENGINE=InnoDB CHARACTER SET utf8mb4 COLLATE utf8mb4_general_ci`
    );
    logger.debug(`[MysqlExecutionRepository] Ensured table ${this.table}`);
  }

  async loadExecutions(): Promise<MigrationExecution[]> {
    const rows = await this.select(`SELECT version, executed_at_ms, finished_at_ms FROM ${this.table}`);
    return decodeExecutions(rows.map(toExecutionRecord), this.table);
  }

  async save(execution: MigrationExecution): Promise<void> {
    await this.client.query(
      `INSERT INTO ${this.table} (version, executed_at_ms, finished_at_ms) VALUES (?, ?, ?)
       ON DUPLICATE KEY UPDATE
         executed_at_ms = VALUES(executed_at_ms),
         finished_at_ms = VALUES(finished_at_ms)`,
      [execution.version, execution.executedAtMs, execution.finishedAtMs]
    );
  }

  async remove(execution: MigrationExecution): Promise<void> {
    await this.client.query(`DELETE FROM ${this.table} WHERE version = ?`, [execution.version]);
  }

  async findOne(version: number): Promise<MigrationExecution | null> {
    const rows = await this.select(
      `SELECT version, executed_at_ms, finished_at_ms FROM ${this.table} WHERE version = ?`,
      [version]
    );
    if (rows.length === 0) return null;
    const [execution] = decodeExecutions(rows.slice(0, 1).map(toExecutionRecord), this.table);
    return execution ?? null;
  }

  private async select(sql: string, values?: unknown[]): Promise<unknown[]> {
    const [rows] = await this.client.query(sql, values);
    if (!Array.isArray(rows)) {
      throw new LedgerReadError(`Unexpected result from ${this.table}: expected rows`, []);
    }
    return rows;
  }
}
