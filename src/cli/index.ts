#!/usr/bin/env node

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import pg from 'pg';
import mysql from 'mysql2/promise';
import { loadConfig } from '../config/loader.js';
import type { MigrunConfig } from '../config/schema.js';
import { DirMigrationsRegistry } from '../migrations/dir-registry.js';
import type { ExecutionRepository } from '../executions/types.js';
import { JsonFileExecutionRepository } from '../executions/repositories/json-file.js';
import { PostgresExecutionRepository } from '../executions/repositories/postgres.js';
import { MysqlExecutionRepository } from '../executions/repositories/mysql.js';
import { getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { bootstrap } from './bootstrap.js';
import { loadMigrations } from './registry-loader.js';

async function readPackageVersion(): Promise<string> {
  try {
    const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
    const packageJson: unknown = JSON.parse(await readFile(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch (error: unknown) {
    logger.debug(`[cli] Unable to read package version: ${getErrorMessage(error)}`);
  }
  return '1.0.0';
}

function createRepository(config: MigrunConfig): { repository: ExecutionRepository; close: () => Promise<void> } {
  if (config.ledger.driver === 'postgres') {
    const pool = new pg.Pool({ connectionString: config.ledger.connectionString, max: 1 });
    return {
      repository: new PostgresExecutionRepository(pool, config.ledger.table),
      close: () => pool.end()
    };
  }
  if (config.ledger.driver === 'mysql') {
    const pool = mysql.createPool({ uri: config.ledger.connectionString, connectionLimit: 1 });
    return {
      repository: new MysqlExecutionRepository(pool, config.ledger.table),
      close: () => pool.end()
    };
  }
  return {
    repository: new JsonFileExecutionRepository(config.ledger.path),
    close: async () => undefined
  };
}

async function main(): Promise<number> {
  const config = await loadConfig({ configPath: process.env.MIGRUN_CONFIG });
  const migrations = await loadMigrations(config.registry);
  const registry = new DirMigrationsRegistry(config.migrationsDir, config.naming).registerAll(migrations);
  const { repository, close } = createRepository(config);

  try {
    return await bootstrap({
      argv: process.argv.slice(2),
      registry,
      repository,
      migrationsDir: config.migrationsDir,
      naming: config.naming,
      version: await readPackageVersion(),
      settings: {
        runExclusively: config.lock.exclusive,
        lockDir: config.lock.dir,
        lockName: config.lock.name
      }
    });
  } finally {
    await close();
    await logger.flush();
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('migrun failed:', error);
    process.exitCode = 1;
  }
);
