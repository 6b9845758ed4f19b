import { access } from 'fs/promises';
import { pathToFileURL } from 'url';
import type { Migration } from '../migrations/types.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export function isMigration(value: unknown): value is Migration {
  return typeof value === 'object' && value !== null &&
    'version' in value && typeof value.version === 'number' &&
    'up' in value && typeof value.up === 'function' &&
    'down' in value && typeof value.down === 'function';
}

/**
 * Import the host's registry module and return its `migrations` export
 * (or default export). A missing module means no migrations are registered.
 */
export async function loadMigrations(modulePath: string): Promise<Migration[]> {
  try {
    await access(modulePath);
  } catch (error: unknown) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
    logger.debug(`[cli] Registry module ${modulePath} not found, no migrations registered`);
    return [];
  }

  const mod: Record<string, unknown> = await import(pathToFileURL(modulePath).href);
  const exported = mod.migrations ?? mod.default;
  if (!Array.isArray(exported)) {
    throw new ConfigurationError(`${modulePath} must export a "migrations" array`);
  }

  return exported.map((item: unknown, index: number) => {
    if (!isMigration(item)) {
      throw new ConfigurationError(`${modulePath}: migrations[${index}] does not implement Migration`);
    }
    return item;
  });
}
