import * as fs from 'fs/promises';
import * as path from 'path';
import type { ExecutionRepository, MigrationExecution } from '../types.js';
import { decodeExecutions } from '../codec.js';
import { LedgerReadError, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Ledger file format
 */
export interface ExecutionLedgerFile {
  /** Ledger file version */
  version: 1;

  executions: MigrationExecution[];
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Ledger stored as a single JSON file, rewritten after every mutation
 */
export class JsonFileExecutionRepository implements ExecutionRepository {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async init(): Promise<void> {
    try {
      await fs.access(this.filePath);
      logger.debug(`[JsonFileExecutionRepository] Ledger exists at ${this.filePath}`);
    } catch (error: unknown) {
      if (!isNotFound(error)) throw error;
      await this.write([]);
      logger.debug(`[JsonFileExecutionRepository] Created ledger at ${this.filePath}`);
    }
  }

  async loadExecutions(): Promise<MigrationExecution[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if (isNotFound(error)) {
        logger.debug('[JsonFileExecutionRepository] No ledger file found, starting fresh');
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error: unknown) {
      throw new LedgerReadError(`Ledger ${this.filePath} is not valid JSON: ${getErrorMessage(error)}`, [], error);
    }

    if (
      typeof parsed !== 'object' || parsed === null ||
      !('executions' in parsed) || !Array.isArray(parsed.executions)
    ) {
      throw new LedgerReadError(`Ledger ${this.filePath} has no executions list`, []);
    }

    const executions = decodeExecutions(parsed.executions, this.filePath);
    logger.debug(`[JsonFileExecutionRepository] Loaded ${executions.length} execution(s)`);
    return executions;
  }

  async save(execution: MigrationExecution): Promise<void> {
    const executions = (await this.loadExecutions()).filter(e => e.version !== execution.version);
    executions.push({ ...execution });
    await this.write(executions);
  }

  async remove(execution: MigrationExecution): Promise<void> {
    const executions = await this.loadExecutions();
    const remaining = executions.filter(e => e.version !== execution.version);
    if (remaining.length === executions.length) {
      logger.debug(`[JsonFileExecutionRepository] No execution recorded for ${execution.version}, nothing to remove`);
      return;
    }
    await this.write(remaining);
  }

  async findOne(version: number): Promise<MigrationExecution | null> {
    const executions = await this.loadExecutions();
    return executions.find(e => e.version === version) ?? null;
  }

  private async write(executions: MigrationExecution[]): Promise<void> {
    const ledger: ExecutionLedgerFile = {
      version: 1,
      executions: [...executions].sort((a, b) => a.version - b.version)
    };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(ledger, null, 2) + '\n', 'utf-8');
    logger.debug(`[JsonFileExecutionRepository] Saved ledger: ${executions.length} execution(s)`);
  }
}
