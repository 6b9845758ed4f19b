import dotenv from 'dotenv';
import { readFile } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { z } from 'zod';
import { configSchema, fileConfigSchema, type FileConfig, type MigrunConfig } from './schema.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'migrun.config.json';

export interface LoadConfigOptions {
  /** Directory used to find the config file and `.env`; defaults to process.cwd() */
  cwd?: string;

  /** Explicit config file; must exist when given */
  configPath?: string;

  /** Environment to read MIGRUN_* overrides from; defaults to process.env. `.env` fills unset keys */
  env?: NodeJS.ProcessEnv;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new ConfigurationError(`${name} must be true, false, 1 or 0 (got "${value}")`);
}

/**
 * MIGRUN_* environment overrides, in the same shape as the config file
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): FileConfig {
  const overrides: FileConfig = {};

  if (env.MIGRUN_MIGRATIONS_DIR) overrides.migrationsDir = env.MIGRUN_MIGRATIONS_DIR;
  if (env.MIGRUN_REGISTRY) overrides.registry = env.MIGRUN_REGISTRY;

  if (env.MIGRUN_DATABASE_URL) {
    const connectionString = env.MIGRUN_DATABASE_URL;
    const table = env.MIGRUN_LEDGER_TABLE || 'migration_executions';
    // The URL scheme picks the driver; anything but mysql:// goes to pg
    overrides.ledger = /^mysql:\/\//i.test(connectionString)
      ? { driver: 'mysql', connectionString, table }
      : { driver: 'postgres', connectionString, table };
  } else if (env.MIGRUN_LEDGER_PATH) {
    overrides.ledger = { driver: 'file', path: env.MIGRUN_LEDGER_PATH };
  }

  const lock: NonNullable<FileConfig['lock']> = {};
  if (env.MIGRUN_LOCK_EXCLUSIVE) lock.exclusive = parseBoolean('MIGRUN_LOCK_EXCLUSIVE', env.MIGRUN_LOCK_EXCLUSIVE);
  if (env.MIGRUN_LOCK_DIR) lock.dir = env.MIGRUN_LOCK_DIR;
  if (env.MIGRUN_LOCK_NAME) lock.name = env.MIGRUN_LOCK_NAME;
  if (Object.keys(lock).length > 0) overrides.lock = lock;

  return overrides;
}

async function readConfigFile(filePath: string, required: boolean): Promise<FileConfig | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug(`[Config] No config file at ${filePath}, using defaults`);
      return null;
    }
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${getErrorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON: ${getErrorMessage(error)}`);
  }

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Load configuration.
 * Priority: MIGRUN_* environment (including `.env`) > config file > defaults.
 * Relative paths resolve against the config file's directory, or `cwd` without one.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<MigrunConfig> {
  const cwd = resolve(options.cwd ?? process.cwd());
  // Values from .env never override the real environment
  const { parsed: dotenvValues } = dotenv.config({ path: join(cwd, '.env'), processEnv: {} });
  const env: NodeJS.ProcessEnv = { ...dotenvValues, ...(options.env ?? process.env) };

  const configPath = resolve(cwd, options.configPath ?? CONFIG_FILE_NAME);
  const fileConfig = await readConfigFile(configPath, options.configPath !== undefined);
  const envConfig = readEnvOverrides(env);
  const baseDir = fileConfig ? dirname(configPath) : cwd;

  const parsed = configSchema.safeParse({
    migrationsDir: envConfig.migrationsDir ?? fileConfig?.migrationsDir,
    registry: envConfig.registry ?? fileConfig?.registry,
    naming: { ...fileConfig?.naming },
    ledger: envConfig.ledger ?? fileConfig?.ledger,
    lock: { ...fileConfig?.lock, ...envConfig.lock }
  });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const config = parsed.data;
  const migrationsDir = resolve(baseDir, config.migrationsDir);
  const ledger = config.ledger.driver === 'file'
    ? { ...config.ledger, path: resolve(baseDir, config.ledger.path) }
    : config.ledger;

  logger.debug(`[Config] Loaded configuration (source: ${fileConfig ? configPath : 'defaults'})`);

  return {
    migrationsDir,
    registry: config.registry ? resolve(baseDir, config.registry) : join(migrationsDir, 'index.js'),
    naming: config.naming,
    ledger,
    lock: { ...config.lock, dir: resolve(baseDir, config.lock.dir) },
    source: fileConfig ? configPath : null
  };
}
