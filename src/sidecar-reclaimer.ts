/**
 * Sidecar purge and empty-folder pruning
 *
 * Sidecars are companion files that are always safe to discard: thumbnail
 * caches, edit lists (.aae), camcorder indexes (.modd/.moff) and AppleDouble
 * resource forks. Pruning walks upward from a directory that just lost an
 * entry and removes every ancestor left empty, stopping below the root.
 */

import { readdirSync, rmdirSync } from 'fs';
import { basename, dirname, resolve } from 'path';
import fg from 'fast-glob';
import type { SorterConfig } from './config.js';
import { isInside } from './file-mover.js';
import { Logger, describeError, isErrnoException } from './logger.js';
import { isSidecarName } from './media-files.js';
import type { TrashBin } from './trash-bin.js';

const logger = new Logger({ context: 'sidecar-reclaimer' });

export interface PurgeResult {
  trashed: string[];
  failed: number;
  prunedDirectories: number;
}

export type TrashOutcome =
  | { status: 'trashed'; prunedDirectories: number }
  | { status: 'vanished' }
  | { status: 'failed'; message: string };

function listNames(dirPath: string): string[] | null {
  try {
    return readdirSync(dirPath);
  } catch {
    return null;
  }
}

/**
 * Remove `startDir` and its ancestors while they are empty, never touching
 * `root` itself. Returns the removed directories, deepest first.
 */
export function pruneEmptyAncestors(startDir: string, root: string): string[] {
  const stop = resolve(root);
  const removed: string[] = [];
  let current = resolve(startDir);

  while (current !== stop && isInside(stop, current)) {
    const names = listNames(current);
    if (names === null || names.length > 0) {
      break;
    }
    try {
      rmdirSync(current);
    } catch (error) {
      logger.debug('Stopped pruning at undeletable folder', { dir: current, error: describeError(error) });
      break;
    }
    removed.push(current);
    current = dirname(current);
  }

  return removed;
}

export class SidecarReclaimer {
  constructor(
    private readonly config: SorterConfig,
    private readonly trashBin: TrashBin
  ) {}

  isSidecar(filePath: string): boolean {
    return isSidecarName(basename(filePath), this.config);
  }

  /**
   * Trash a file and prune the folders it leaves empty (up to `root`).
   * A file that vanished before it could be trashed is not a failure.
   */
  async trashAndPrune(filePath: string, root: string): Promise<TrashOutcome> {
    try {
      await this.trashBin.trash(filePath);
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        return { status: 'vanished' };
      }
      const message = `Could not trash ${filePath}: ${describeError(error)}`;
      logger.warn(message);
      return { status: 'failed', message };
    }

    const pruned = pruneEmptyAncestors(dirname(filePath), root);
    return { status: 'trashed', prunedDirectories: pruned.length };
  }

  /**
   * Trash every sidecar anywhere under `root`
   */
  async purge(root: string): Promise<PurgeResult> {
    const result: PurgeResult = { trashed: [], failed: 0, prunedDirectories: 0 };

    const files = await fg('**/*', {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
      suppressErrors: true,
    });
    files.sort();

    for (const file of files) {
      if (!this.isSidecar(file)) continue;

      const outcome = await this.trashAndPrune(file, root);
      switch (outcome.status) {
        case 'trashed':
          result.trashed.push(file);
          result.prunedDirectories += outcome.prunedDirectories;
          break;
        case 'failed':
          result.failed += 1;
          break;
        case 'vanished':
          break;
      }
    }

    if (result.trashed.length > 0) {
      logger.info(`Trashed ${result.trashed.length} sidecar files`, { root });
    }
    return result;
  }
}
