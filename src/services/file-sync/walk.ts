import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { createComponentLogger } from '../../utils/logger.js';

const logger = createComponentLogger('file-sync');

async function collectMarkdownFiles(dir: string, markerPrefix: string, files: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      await collectMarkdownFiles(fullPath, markerPrefix, files);
    } else if (
      entry.isFile() &&
      extname(entry.name) === '.md' &&
      !entry.name.startsWith(markerPrefix)
    ) {
      files.push(fullPath);
    }
  }
}

/**
 * Every unmarked `.md` file under `root`, sorted by path. A missing root yields none.
 */
export async function findSourceDocuments(root: string, markerPrefix: string): Promise<string[]> {
  const files: string[] = [];

  try {
    await collectMarkdownFiles(root, markerPrefix, files);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn({ root }, 'Source directory does not exist');
      return [];
    }
    throw error;
  }

  return files.sort();
}
