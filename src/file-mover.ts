/**
 * Collision-safe file and folder relocation
 */

import {
  copyFileSync,
  cpSync,
  existsSync,
  mkdirSync,
  readdirSync,
  renameSync,
  rmdirSync,
  rmSync,
  statSync,
  unlinkSync,
  utimesSync,
} from 'fs';
import { basename, dirname, extname, isAbsolute, join, relative, resolve } from 'path';
import { AppError, Logger, describeError, isErrnoException } from './logger.js';

const logger = new Logger({ context: 'file-mover' });

const READ_ONLY_CODES = ['EROFS', 'EACCES', 'EPERM'];

export type MoveOutcome =
  | { status: 'moved'; destination: string }
  | { status: 'unchanged'; destination: string }
  | { status: 'skipped'; reason: 'read-only' | 'vanished' | 'failed'; message: string };

export function isInside(parentPath: string, candidatePath: string): boolean {
  const rel = relative(resolve(parentPath), resolve(candidatePath));
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * Absolute path of an existing directory to work under
 */
export function resolveRootDirectory(rootPath: string): string {
  const root = resolve(rootPath);
  const stats = statSync(root, { throwIfNoEntry: false });
  if (!stats) {
    throw new AppError(`Root folder does not exist: ${root}`, 'ROOT_NOT_FOUND', 404, { root });
  }
  if (!stats.isDirectory()) {
    throw new AppError(`Root is not a folder: ${root}`, 'ROOT_NOT_DIRECTORY', 400, { root });
  }
  return root;
}

/**
 * Create a directory (and parents). Returns false on a read-only or
 * permission-denied filesystem instead of throwing.
 */
export function ensureDirectory(dirPath: string): boolean {
  try {
    mkdirSync(dirPath, { recursive: true });
    return true;
  } catch (error) {
    if (isErrnoException(error, ...READ_ONLY_CODES)) {
      logger.warn(`Cannot create directory ${dirPath}: read-only filesystem, skipping`, { code: error.code });
      return false;
    }
    throw error;
  }
}

/**
 * First free name in `dirPath`: `IMG_1.jpg`, then `IMG_1 (1).jpg`, `IMG_1 (2).jpg`, ...
 */
export function uniqueDestination(dirPath: string, name: string): string {
  let candidate = join(dirPath, name);
  if (!existsSync(candidate)) {
    return candidate;
  }

  const extension = extname(name);
  const stem = basename(name, extension);
  for (let counter = 1; ; counter++) {
    candidate = join(dirPath, `${stem} (${counter})${extension}`);
    if (!existsSync(candidate)) {
      return candidate;
    }
  }
}

function renameAcrossDevices(source: string, destination: string, isDirectory: boolean): void {
  try {
    renameSync(source, destination);
  } catch (error) {
    if (!isErrnoException(error, 'EXDEV')) {
      throw error;
    }
    if (isDirectory) {
      cpSync(source, destination, { recursive: true, preserveTimestamps: true, errorOnExist: true });
      rmSync(source, { recursive: true });
    } else {
      const { atime, mtime } = statSync(source);
      copyFileSync(source, destination);
      utimesSync(destination, atime, mtime);
      unlinkSync(source);
    }
  }
}

function skippedOutcome(source: string, error: unknown): MoveOutcome {
  if (isErrnoException(error, 'ENOENT')) {
    // Listed a moment ago, gone now
    return { status: 'skipped', reason: 'vanished', message: `${source} no longer exists` };
  }
  if (isErrnoException(error, ...READ_ONLY_CODES)) {
    return { status: 'skipped', reason: 'read-only', message: `Cannot move ${source}: ${describeError(error)}` };
  }
  return { status: 'skipped', reason: 'failed', message: `Cannot move ${source}: ${describeError(error)}` };
}

/**
 * Move a file into `destinationDir`, creating it on demand. Never overwrites:
 * a name clash gets a ` (n)` suffix. Moving a file into its own directory is
 * a no-op.
 */
export function moveFileInto(filePath: string, destinationDir: string): MoveOutcome {
  const source = resolve(filePath);
  const targetDir = resolve(destinationDir);

  if (dirname(source) === targetDir) {
    return { status: 'unchanged', destination: source };
  }

  try {
    if (!ensureDirectory(targetDir)) {
      return { status: 'skipped', reason: 'read-only', message: `Cannot create ${targetDir}` };
    }
    const destination = uniqueDestination(targetDir, basename(source));
    renameAcrossDevices(source, destination, false);
    logger.debug('Moved file', { from: source, to: destination });
    return { status: 'moved', destination };
  } catch (error) {
    return skippedOutcome(source, error);
  }
}

/**
 * Move a folder under `parentDir`, keeping its name. When the parent already
 * holds a folder of that name the two are merged entry by entry.
 */
export function moveDirectoryInto(dirPath: string, parentDir: string): MoveOutcome {
  const source = resolve(dirPath);
  const targetParent = resolve(parentDir);

  if (dirname(source) === targetParent) {
    return { status: 'unchanged', destination: source };
  }
  if (isInside(source, targetParent)) {
    return { status: 'skipped', reason: 'failed', message: `Cannot move ${source} into itself` };
  }

  try {
    if (!ensureDirectory(targetParent)) {
      return { status: 'skipped', reason: 'read-only', message: `Cannot create ${targetParent}` };
    }

    const destination = join(targetParent, basename(source));
    if (!existsSync(destination)) {
      renameAcrossDevices(source, destination, true);
      logger.debug('Moved folder', { from: source, to: destination });
      return { status: 'moved', destination };
    }

    mergeDirectory(source, destination);
    return { status: 'moved', destination };
  } catch (error) {
    return skippedOutcome(source, error);
  }
}

function mergeDirectory(source: string, destination: string): void {
  for (const name of readdirSync(source).sort()) {
    const entry = join(source, name);
    const target = join(destination, name);
    if (statSync(entry).isDirectory() && existsSync(target) && statSync(target).isDirectory()) {
      mergeDirectory(entry, target);
      continue;
    }
    const finalTarget = existsSync(target) ? uniqueDestination(destination, name) : target;
    renameAcrossDevices(entry, finalTarget, statSync(entry).isDirectory());
  }
  rmdirSync(source);
  logger.debug('Merged folder', { from: source, into: destination });
}
