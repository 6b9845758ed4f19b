export { migrationExecutionSchema } from './types.js';
export type { MigrationExecution, ExecutionRepository } from './types.js';
export { decodeExecutions } from './codec.js';
export { MemoryExecutionRepository } from './repositories/memory.js';
export { JsonFileExecutionRepository } from './repositories/json-file.js';
export type { ExecutionLedgerFile } from './repositories/json-file.js';
export { PostgresExecutionRepository, quoteTableName } from './repositories/postgres.js';
export type { PostgresQueryable } from './repositories/postgres.js';
export { MysqlExecutionRepository, quoteMysqlTableName } from './repositories/mysql.js';
export type { MysqlQueryable } from './repositories/mysql.js';
