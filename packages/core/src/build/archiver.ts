/**
 * Archiver
 * Compresses the application bundle into a single .tar.gz beside it
 */

import { ArchiveError, createChildLogger, errorMessage } from '@apppack/shared';
import { rm } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import * as tar from 'tar';
import { ARCHIVE_EXTENSION } from './types.js';

const logger = createChildLogger({ component: 'Archiver' });

/**
 * Write `<bundle>.tar.gz` next to the bundle; entries are rooted at the bundle
 * directory so extracting yields `<bundle>/...`
 */
export async function createArchive(bundlePath: string): Promise<string> {
  const archivePath = `${bundlePath}${ARCHIVE_EXTENSION}`;
  const bundleName = basename(bundlePath);

  logger.info({ bundlePath, archivePath }, 'Creating archive');

  try {
    await tar.create(
      {
        gzip: true,
        cwd: dirname(bundlePath),
        file: archivePath,
        portable: true,
      },
      [bundleName]
    );
  } catch (error) {
    await rm(archivePath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn({ archivePath, error: errorMessage(cleanupError) }, 'Could not remove partial archive');
    });
    throw new ArchiveError(
      `Cannot archive ${bundleName}: ${errorMessage(error)}`,
      { bundlePath, archivePath },
      { cause: error }
    );
  }

  return archivePath;
}
