import { ConfigurationError } from '../../utils/errors.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Split and check a possibly schema-qualified table name (`schema.table`)
 */
export function tableNameParts(tableName: string): string[] {
  const parts = tableName.split('.');
  if (parts.length > 2 || !parts.every(part => IDENTIFIER.test(part))) {
    throw new ConfigurationError(`Invalid ledger table name: ${tableName}`);
  }
  return parts;
}

interface ExecutionRow {
  version: unknown;
  executed_at_ms: unknown;
  finished_at_ms: unknown;
}

function isExecutionRow(row: unknown): row is ExecutionRow {
  return typeof row === 'object' && row !== null &&
    'version' in row && 'executed_at_ms' in row && 'finished_at_ms' in row;
}

/**
 * Map a snake_case ledger row to the record shape the codec decodes.
 * Anything else passes through and fails decoding.
 */
export function toExecutionRecord(row: unknown): unknown {
  if (!isExecutionRow(row)) return row;
  return {
    version: row.version,
    executedAtMs: row.executed_at_ms,
    finishedAtMs: row.finished_at_ms
  };
}
