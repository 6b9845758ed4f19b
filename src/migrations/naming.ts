/**
 * Migration file naming convention: `<prefix><separator><version><suffix>`,
 * e.g. `version_1712953077.ts`
 */
export interface MigrationFileNaming {
  prefix: string;
  separator: string;
  suffix: string;
}

export const DEFAULT_NAMING: MigrationFileNaming = {
  prefix: 'version',
  separator: '_',
  suffix: '.ts'
};

export function migrationFileName(version: number, naming: MigrationFileNaming = DEFAULT_NAMING): string {
  return `${naming.prefix}${naming.separator}${version}${naming.suffix}`;
}

/**
 * Extract the version declared by a file name
 * @returns The version, or null when the name does not follow the convention
 */
export function parseMigrationFileName(
  fileName: string,
  naming: MigrationFileNaming = DEFAULT_NAMING
): number | null {
  const head = naming.prefix + naming.separator;
  if (!fileName.startsWith(head) || !fileName.endsWith(naming.suffix)) {
    return null;
  }

  const digits = fileName.slice(head.length, fileName.length - naming.suffix.length);
  if (!/^\d+$/.test(digits)) {
    return null;
  }

  const version = Number(digits);
  return Number.isSafeInteger(version) ? version : null;
}
