/**
 * Relocator
 * Moves finished artifacts into the destination directory, replacing
 * same-named entries there without confirmation
 */

import { createChildLogger, errorMessage, RelocationError } from '@apppack/shared';
import { access, constants, cp, lstat, rename, rm, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { RelocationResult } from './types.js';

const logger = createChildLogger({ component: 'Relocator' });

/**
 * The destination must be an existing directory the process can write to.
 * Checked before anything is deleted or moved.
 */
export async function assertWritableDirectory(dir: string): Promise<void> {
  try {
    const stats = await stat(dir);
    if (!stats.isDirectory()) {
      throw new RelocationError(`Destination ${dir} is not a directory`, { destinationDir: dir });
    }
    await access(dir, constants.W_OK | constants.X_OK);
  } catch (error) {
    if (error instanceof RelocationError) throw error;
    throw new RelocationError(
      `Destination ${dir} is not accessible: ${errorMessage(error)}`,
      { destinationDir: dir },
      { cause: error }
    );
  }
}

/** True for any entry at path, including a dangling symlink */
async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * rename(2), or copy then remove when source and target are on different devices
 */
async function moveEntry(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') throw error;
    await cp(source, target, { recursive: true, preserveTimestamps: true, verbatimSymlinks: true });
    await rm(source, { recursive: true, force: true });
  }
}

/**
 * Move each artifact into destinationDir in order. An existing entry with the
 * same name is deleted first. On failure, artifacts not yet moved stay where
 * they are.
 */
export async function relocateArtifacts(
  artifacts: string[],
  destinationDir: string
): Promise<RelocationResult> {
  await assertWritableDirectory(destinationDir);

  const result: RelocationResult = { moved: [], replaced: [] };

  for (const source of artifacts) {
    const target = join(destinationDir, basename(source));
    try {
      if (await exists(target)) {
        logger.info({ target }, 'Replacing existing artifact in destination');
        await rm(target, { recursive: true, force: true });
        result.replaced.push(target);
      }
      await moveEntry(source, target);
    } catch (error) {
      throw new RelocationError(
        `Cannot move ${basename(source)} to ${destinationDir}: ${errorMessage(error)}`,
        { source, target, moved: [...result.moved] },
        { cause: error }
      );
    }
    result.moved.push(target);
    logger.info({ source, target }, 'Artifact relocated');
  }

  return result;
}
