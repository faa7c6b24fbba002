import fs from 'fs/promises';
import path from 'path';
import { Logger, createLogger } from '../common/logger';
import { errorCode } from '../common/utils';
import { Pnn } from '../types';
import { CommandRunner, ProcessCommandRunner } from './CommandRunner';

export const DEFAULT_DATABASE_DIR = '/var/lib/ctdb/persistent';

export const LEGACY_DATABASE_FILES: readonly string[] = [
  'account_policy.tdb',
  'group_mapping.tdb',
  'passdb.tdb',
  'registry.tdb',
  'secrets.tdb',
  'share_info.tdb',
  'winbindd_idmap.tdb'
];

export const LEGACY_DATABASE_DIRS: readonly string[] = [
  '/var/lib/samba',
  '/var/lib/samba/private'
];

export interface LegacyMigrationOptions {
  destDir?: string;
  pnn?: Pnn;
  sourceDirs?: readonly string[];
  fileNames?: readonly string[];
  runner?: CommandRunner;
  logger?: Logger;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Convert every legacy database found in the source directories into a
 * clustered database file named "<name>.<pnn>" in destDir. One converter
 * invocation per file; failures propagate and nothing is retried.
 */
export async function migrateLegacyDatabases(options: LegacyMigrationOptions = {}): Promise<string[]> {
  const destDir = options.destDir ?? DEFAULT_DATABASE_DIR;
  const pnn = options.pnn ?? 0;
  const runner = options.runner ?? new ProcessCommandRunner();
  const logger = options.logger ?? createLogger({ component: 'migrate' });
  const converted: string[] = [];

  for (const fileName of options.fileNames ?? LEGACY_DATABASE_FILES) {
    for (const sourceDir of options.sourceDirs ?? LEGACY_DATABASE_DIRS) {
      const sourcePath = path.join(sourceDir, fileName);
      logger.debug(`Checking for ${sourcePath}`);
      if (!(await isRegularFile(sourcePath))) {
        continue;
      }
      const outputPath = path.join(destDir, `${fileName}.${pnn}`);
      logger.info(`Converting ${sourcePath} to ${outputPath}`);
      await runner.run(['ltdbtool', 'convert', '-s0', sourcePath, outputPath]);
      converted.push(outputPath);
    }
  }

  return converted;
}
