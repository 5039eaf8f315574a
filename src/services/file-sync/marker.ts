/**
 * Resumability marker and output writes
 *
 * A processed source is renamed in place with the marker prefix; the walker
 * skips marked names, so reruns only see unprocessed documents.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, relative } from 'node:path';
import { createFileSystemError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';

const logger = createComponentLogger('file-sync');

/**
 * Rename `path` to `<dir>/<prefix><name>`, replacing any existing target. Returns the new path.
 */
export async function markAsProcessed(path: string, markerPrefix: string): Promise<string> {
  const target = join(dirname(path), markerPrefix + basename(path));

  try {
    await rm(target, { force: true });
    await rename(path, target);
  } catch (error) {
    throw createFileSystemError('mark', path, error);
  }

  logger.debug({ from: path, to: target }, 'Marked source as processed');
  return target;
}

/**
 * Map a source path into the output tree, keeping its path relative to the source root
 */
export function mirrorPath(sourcePath: string, sourceRoot: string, outputRoot: string): string {
  return join(outputRoot, relative(sourceRoot, sourcePath));
}

/**
 * Write a document, creating parent directories and overwriting any existing file
 */
export async function writeOutput(destPath: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(destPath), { recursive: true });
    await writeFile(destPath, content, 'utf-8');
  } catch (error) {
    throw createFileSystemError('write', destPath, error);
  }
}
