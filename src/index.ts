/**
 * migrun - versioned, reversible migrations with a persisted execution ledger
 */

export * from './migrations/index.js';
export * from './executions/index.js';
export { ProcessLock, isProcessAlive } from './lock/process-lock.js';
export type { ProcessLockOptions } from './lock/process-lock.js';
export { bootstrap, createProgram } from './cli/bootstrap.js';
export type { BootstrapOptions, BootstrapSettings } from './cli/bootstrap.js';
export type { CliOutput } from './cli/reporter.js';
export { loadConfig, CONFIG_FILE_NAME } from './config/loader.js';
export type { MigrunConfig, LedgerConfig, LockConfig } from './config/schema.js';
export * from './utils/errors.js';
export { logger } from './utils/logger.js';
export type { MigrunLogger } from './utils/logger.js';
