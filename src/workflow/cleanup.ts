import { Dirent } from 'fs';
import { readdir, rmdir, unlink } from 'fs/promises';
import path from 'path';
import { errorMessage } from '../errors';
import { Logger } from '../logger';

/**
 * Delete junk files (Thumbs.db, .DS_Store, ...) found by the scanner
 *
 * @returns number of files deleted
 */
export async function deleteJunkFiles(paths: string[], logger: Logger): Promise<number> {
  let deleted = 0;
  for (const junkPath of paths) {
    try {
      await unlink(junkPath);
      deleted++;
      logger.debug({ path: junkPath }, 'Deleted junk file');
    } catch (error) {
      logger.warn({ path: junkPath, err: errorMessage(error) }, 'Could not delete junk file');
    }
  }
  return deleted;
}

/**
 * Remove directories below `root` that are empty once their children have
 * been pruned. The root itself and `exclude` are kept.
 *
 * @returns number of directories removed
 */
export async function removeEmptyDirectories(
  root: string,
  logger: Logger,
  exclude: string[] = []
): Promise<number> {
  const keep = new Set([path.resolve(root), ...exclude.map((dir) => path.resolve(dir))]);
  let removed = 0;

  const prune = async (dir: string): Promise<boolean> => {
    if (keep.has(dir) && dir !== path.resolve(root)) {
      return false;
    }

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.warn({ dir, err: errorMessage(error) }, 'Could not read directory during cleanup');
      return false;
    }

    let empty = true;
    for (const entry of entries) {
      if (entry.isDirectory() && (await prune(path.join(dir, entry.name)))) {
        continue;
      }
      empty = false;
    }

    if (!empty || keep.has(dir)) {
      return false;
    }
    try {
      await rmdir(dir);
      removed++;
      logger.debug({ dir }, 'Removed empty directory');
      return true;
    } catch (error) {
      logger.warn({ dir, err: errorMessage(error) }, 'Could not remove directory');
      return false;
    }
  };

  await prune(path.resolve(root));
  return removed;
}
