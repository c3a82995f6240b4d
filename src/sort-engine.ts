/**
 * Sort Engine
 *
 * One pass over a photo tree:
 *   1. trash sidecars
 *   2. consolidate backup folders, deepest first
 *   3. post-order walk asking the decision source about every unclassified
 *      folder that still holds media
 *   4. sweep the remaining loose files into Screenshots / ScreenRecordings /
 *      YYYY/MM-Month
 *
 * Re-running a pass on its own output moves nothing.
 */

import { existsSync, readdirSync } from 'fs';
import { basename, dirname, join, resolve, sep } from 'path';
import { inferBackupDate } from './backup-date.js';
import type { SorterConfig } from './config.js';
import type { FolderDecision, FolderDecisionSource } from './decision-source.js';
import { isInside, moveDirectoryInto, moveFileInto, resolveRootDirectory } from './file-mover.js';
import { Logger } from './logger.js';
import { classifyFolderName, type MediaClassifier } from './media-classifier.js';
import { isMediaFile, listDirectory, listMediaFiles } from './media-files.js';
import { pruneEmptyAncestors, type SidecarReclaimer } from './sidecar-reclaimer.js';
import {
  formatMonthFolder,
  resolveEarliestTimestamp,
  sameCalendarDate,
  toCalendarDate,
  type TimestampResolver,
} from './timestamp-resolver.js';
import { createSortReport, type MediaKind, type SortReport, type WalkSignal } from './types.js';

const logger = new Logger({ context: 'sort-engine' });

const CONTINUE: WalkSignal = { kind: 'continue' };
const SKIP_SUBTREE: WalkSignal = { kind: 'skip-subtree' };
const ABORT: WalkSignal = { kind: 'abort' };

export interface SortEngineOptions {
  config: SorterConfig;
  classifier: MediaClassifier;
  reclaimer: SidecarReclaimer;
  decisions: FolderDecisionSource;
  resolveTimestamp?: TimestampResolver;
}

interface PassState {
  root: string;
  report: SortReport;
  /** Folders the decision source asked to leave alone, with their subtrees */
  protectedDirs: Set<string>;
}

interface WalkFrame {
  dir: string;
  expanded: boolean;
}

type SweepMode = 'normal' | 'bucket' | 'auto';

function isEmptyDirectory(dirPath: string): boolean {
  try {
    return readdirSync(dirPath).length === 0;
  } catch {
    return false;
  }
}

function depthOf(dirPath: string): number {
  return dirPath.split(sep).length;
}

export class SortEngine {
  private readonly config: SorterConfig;
  private readonly classifier: MediaClassifier;
  private readonly reclaimer: SidecarReclaimer;
  private readonly decisions: FolderDecisionSource;
  private readonly resolveTimestamp: TimestampResolver;

  constructor(options: SortEngineOptions) {
    this.config = options.config;
    this.classifier = options.classifier;
    this.reclaimer = options.reclaimer;
    this.decisions = options.decisions;
    this.resolveTimestamp = options.resolveTimestamp ?? resolveEarliestTimestamp;
  }

  async run(rootPath: string): Promise<SortReport> {
    const root = resolveRootDirectory(rootPath);
    const state: PassState = { root, report: createSortReport(root), protectedDirs: new Set() };
    logger.info(`Sorting ${root}`);

    const purge = await this.reclaimer.purge(root);
    state.report.sidecarsTrashed = purge.trashed.length;
    state.report.skipped += purge.failed;
    state.report.prunedDirectories += purge.prunedDirectories;

    await this.consolidateBackups(state);

    const signal = await this.walk(state);
    if (signal.kind === 'abort') {
      state.report.aborted = true;
      logger.info('Sort stopped on request; moves made so far are kept');
      return state.report;
    }

    await this.sweep(state);
    logger.info('Sort finished', {
      moved: state.report.moved,
      unchanged: state.report.unchanged,
      skipped: state.report.skipped,
    });
    return state.report;
  }

  /**
   * Destination folder for a file under `targetRoot`
   */
  async destinationFor(filePath: string, targetRoot: string, kind?: MediaKind): Promise<string> {
    const resolvedKind = kind ?? (await this.classifier.classifyFile(filePath));
    switch (resolvedKind) {
      case 'screenshot':
        return join(targetRoot, this.config.buckets.screenshots);
      case 'screen_recording':
        return join(targetRoot, this.config.buckets.screenRecordings);
      case 'plain': {
        const timestamp = this.resolveTimestamp(filePath);
        return join(targetRoot, String(timestamp.getFullYear()), formatMonthFolder(timestamp));
      }
    }
  }

  // --- backups -------------------------------------------------------------

  private collectBackupFolders(root: string): string[] {
    const found: string[] = [];
    const stack = [root];

    for (let dir = stack.pop(); dir !== undefined; dir = stack.pop()) {
      for (const child of listDirectory(dir).directories) {
        if (classifyFolderName(basename(child), this.config) === 'backup') {
          found.push(child);
        }
        stack.push(child);
      }
    }

    // Innermost first so nested dumps resolve before their parents
    return found.sort((left, right) => depthOf(right) - depthOf(left) || (left < right ? -1 : left > right ? 1 : 0));
  }

  private async consolidateBackups(state: PassState): Promise<void> {
    for (const folder of this.collectBackupFolders(state.root)) {
      if (!existsSync(folder)) continue;
      await this.consolidateBackup(folder, state);
    }
  }

  private async consolidateBackup(folder: string, state: PassState): Promise<void> {
    const { report, root } = state;
    const inference = inferBackupDate(folder, this.config, this.resolveTimestamp);
    let stayed = 0;

    for (const file of listMediaFiles(folder, this.config)) {
      const kind = await this.classifier.classifyFile(file);
      if (kind === 'plain' && inference.date) {
        const own = toCalendarDate(this.resolveTimestamp(file));
        if (sameCalendarDate(own, inference.date)) {
          stayed += 1;
          report.unchanged += 1;
          continue;
        }
      }
      this.relocate(file, await this.destinationFor(file, root, kind), folder, state);
    }

    if (!inference.date) {
      if (isEmptyDirectory(folder)) {
        const removed = pruneEmptyAncestors(folder, root);
        if (removed.length > 0) {
          report.backupsRemoved += 1;
          report.prunedDirectories += removed.length - 1;
        }
        logger.info(`Backup '${basename(folder)}' fully dispersed and removed`);
        return;
      }
      const message = `Backup '${folder}' has no reliable date and still holds non-media entries; left in place`;
      report.warnings.push(message);
      logger.warn(message);
      return;
    }

    // A dated backup is archived even when every file left it
    const outcome = moveDirectoryInto(folder, join(root, String(inference.date.year)));
    switch (outcome.status) {
      case 'moved':
        report.backupsArchived += 1;
        report.prunedDirectories += pruneEmptyAncestors(dirname(folder), root).length;
        logger.info(`Backup '${basename(folder)}' archived`, {
          to: outcome.destination,
          confidence: inference.confidence,
          kept: stayed,
        });
        break;
      case 'unchanged':
        break;
      case 'skipped':
        report.skipped += 1;
        report.warnings.push(outcome.message);
        logger.warn(outcome.message);
        break;
    }
  }

  // --- folder walk ---------------------------------------------------------

  private isProtected(dirPath: string, state: PassState): boolean {
    for (const protectedDir of state.protectedDirs) {
      if (isInside(protectedDir, dirPath)) return true;
    }
    return false;
  }

  /**
   * Iterative post-order walk: a folder's decision is asked only after every
   * folder below it has been handled.
   */
  private async walk(state: PassState): Promise<WalkSignal> {
    const stack: WalkFrame[] = [];
    const pushChildren = (dir: string) => {
      const children = listDirectory(dir).directories;
      for (let index = children.length - 1; index >= 0; index--) {
        stack.push({ dir: children[index], expanded: false });
      }
    };

    pushChildren(state.root);

    for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
      if (!existsSync(frame.dir)) continue;

      if (!frame.expanded) {
        if (this.enterFolder(frame.dir, state).kind === 'skip-subtree') continue;
        stack.push({ dir: frame.dir, expanded: true });
        pushChildren(frame.dir);
        continue;
      }

      const signal = await this.leaveFolder(frame.dir, state);
      if (signal.kind === 'abort') return signal;
    }

    return CONTINUE;
  }

  private enterFolder(dir: string, state: PassState): WalkSignal {
    if (this.isProtected(dir, state)) return SKIP_SUBTREE;
    // Year/month are placed already, backups were consolidated, generated
    // buckets are never asked about (the sweep places anything nested in them)
    return classifyFolderName(basename(dir), this.config) === 'unclassified' ? CONTINUE : SKIP_SUBTREE;
  }

  private collectMedia(dir: string, state: PassState): string[] {
    const media: string[] = [];
    const stack = [dir];

    for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
      const listing = listDirectory(current);
      media.push(...listing.files.filter(file => isMediaFile(file, this.config)));
      for (const child of listing.directories) {
        if (this.isProtected(child, state)) continue;
        if (classifyFolderName(basename(child), this.config) === 'backup') continue;
        stack.push(child);
      }
    }

    return media.sort();
  }

  private async leaveFolder(dir: string, state: PassState): Promise<WalkSignal> {
    const { report, root } = state;
    const media = this.collectMedia(dir, state);

    if (media.length === 0) {
      report.prunedDirectories += pruneEmptyAncestors(dir, root).length;
      return CONTINUE;
    }

    const decision: FolderDecision = await this.decisions.decideFolder(dir);
    logger.debug('Folder decision', { dir, decision, media: media.length });

    switch (decision) {
      case 'quit':
        return ABORT;

      case 'skip':
        state.protectedDirs.add(dir);
        report.foldersSkipped += 1;
        return CONTINUE;

      case 'keep':
        await this.keepFolder(dir, state);
        return CONTINUE;

      case 'sort_inside':
        for (const file of media) {
          await this.placeFile(file, dir, dir, state);
        }
        state.protectedDirs.add(dir);
        report.foldersSorted += 1;
        return CONTINUE;

      case 'sort_into_years':
        for (const file of media) {
          await this.placeFile(file, root, root, state);
        }
        report.foldersSorted += 1;
        return CONTINUE;
    }
  }

  private async keepFolder(dir: string, state: PassState): Promise<void> {
    const { report, root } = state;
    const target = await this.decisions.pickRelocationTarget(dir);

    if (!target) {
      state.protectedDirs.add(dir);
      report.foldersKept += 1;
      return;
    }

    const outcome = moveDirectoryInto(dir, resolve(target));
    switch (outcome.status) {
      case 'moved':
        state.protectedDirs.add(outcome.destination);
        report.foldersRelocated += 1;
        report.prunedDirectories += pruneEmptyAncestors(dirname(dir), root).length;
        logger.info(`Moved folder '${basename(dir)}'`, { to: outcome.destination });
        break;
      case 'unchanged':
        state.protectedDirs.add(dir);
        report.foldersKept += 1;
        break;
      case 'skipped':
        state.protectedDirs.add(dir);
        report.skipped += 1;
        report.warnings.push(outcome.message);
        logger.warn(outcome.message);
        break;
    }
  }

  // --- loose files ---------------------------------------------------------

  /**
   * Media files not yet in their place: loose at the root, loose directly in
   * a year folder, nested inside a generated bucket, or left in an
   * unclassified folder.
   */
  private collectLooseFiles(state: PassState): string[] {
    const loose: string[] = [];
    const stack: Array<{ dir: string; mode: SweepMode }> = [{ dir: state.root, mode: 'normal' }];

    for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
      const { dir, mode } = frame;
      const listing = listDirectory(dir);

      if (mode !== 'bucket') {
        loose.push(...listing.files.filter(file => isMediaFile(file, this.config)));
      }

      for (const child of listing.directories) {
        if (this.isProtected(child, state)) continue;
        const kind = classifyFolderName(basename(child), this.config);

        if (kind === 'backup') continue;

        if (mode === 'bucket' || mode === 'auto') {
          stack.push({ dir: child, mode: 'auto' });
          continue;
        }

        switch (kind) {
          case 'month':
            break;
          case 'year':
            loose.push(...listMediaFiles(child, this.config));
            break;
          case 'generated':
            stack.push({ dir: child, mode: dir === state.root ? 'bucket' : 'auto' });
            break;
          case 'unclassified':
            stack.push({ dir: child, mode: 'normal' });
            break;
        }
      }
    }

    return loose.sort();
  }

  private async sweep(state: PassState): Promise<void> {
    for (const file of this.collectLooseFiles(state)) {
      if (!existsSync(file)) continue;
      await this.placeFile(file, state.root, state.root, state);
    }
  }

  // --- moves ---------------------------------------------------------------

  private async placeFile(file: string, targetRoot: string, pruneBoundary: string, state: PassState): Promise<void> {
    const destination = await this.destinationFor(file, targetRoot);
    this.relocate(file, destination, pruneBoundary, state);
  }

  private relocate(file: string, destinationDir: string, pruneBoundary: string, state: PassState): void {
    const { report } = state;
    const outcome = moveFileInto(file, destinationDir);

    switch (outcome.status) {
      case 'moved':
        report.moved += 1;
        report.prunedDirectories += pruneEmptyAncestors(dirname(file), pruneBoundary).length;
        break;
      case 'unchanged':
        report.unchanged += 1;
        break;
      case 'skipped':
        if (outcome.reason !== 'vanished') {
          report.skipped += 1;
          report.warnings.push(outcome.message);
          logger.warn(outcome.message);
        }
        break;
    }
  }
}
