/**
 * Review passes that put individual files in front of the decision source:
 * live-photo companions, and every image folder by folder.
 */

import { dirname, join } from 'path';
import fg from 'fast-glob';
import type { SorterConfig } from './config.js';
import type { ReviewDecisionSource } from './decision-source.js';
import { isInside, moveFileInto, resolveRootDirectory } from './file-mover.js';
import { Logger } from './logger.js';
import { isImageFile, isMediaFile, isVideoFile, stemOf } from './media-files.js';
import { pruneEmptyAncestors, type SidecarReclaimer } from './sidecar-reclaimer.js';
import type { ReviewReport } from './types.js';

const logger = new Logger({ context: 'review-engine' });

export interface ReviewEngineOptions {
  config: SorterConfig;
  reclaimer: SidecarReclaimer;
  decisions: ReviewDecisionSource;
}

export function createReviewReport(root: string): ReviewReport {
  return { root, reviewed: 0, kept: 0, trashed: 0, memes: 0, skippedFolders: 0, failed: 0, aborted: false };
}

export class ReviewEngine {
  private readonly config: SorterConfig;
  private readonly reclaimer: SidecarReclaimer;
  private readonly decisions: ReviewDecisionSource;

  constructor(options: ReviewEngineOptions) {
    this.config = options.config;
    this.reclaimer = options.reclaimer;
    this.decisions = options.decisions;
  }

  isLivePhotoCompanion(filePath: string): boolean {
    return (
      isVideoFile(filePath, this.config) &&
      stemOf(filePath).toLowerCase().endsWith(this.config.livePhotoSuffix.toLowerCase())
    );
  }

  async reviewLivePhotos(rootPath: string): Promise<ReviewReport> {
    const root = resolveRootDirectory(rootPath);
    const report = createReviewReport(root);
    const companions = (await this.listMedia(root)).filter(file => this.isLivePhotoCompanion(file));
    logger.info(`Reviewing ${companions.length} live-photo companions`, { root });

    for (const file of companions) {
      const decision = await this.decisions.decideLivePhoto(file);
      report.reviewed += 1;

      if (decision === 'quit') {
        report.aborted = true;
        return report;
      }
      if (decision === 'keep') {
        report.kept += 1;
        continue;
      }
      await this.trash(file, root, report);
    }

    return report;
  }

  /**
   * Every image outside the memes bucket, one folder at a time
   */
  async reviewImages(rootPath: string): Promise<ReviewReport> {
    const root = resolveRootDirectory(rootPath);
    const report = createReviewReport(root);
    const memesDir = join(root, this.config.buckets.memes);

    const byFolder = new Map<string, string[]>();
    for (const file of await this.listMedia(root)) {
      if (!isImageFile(file, this.config) || isInside(memesDir, file)) continue;
      const folder = dirname(file);
      const files = byFolder.get(folder) ?? [];
      files.push(file);
      byFolder.set(folder, files);
    }

    const folders = [...byFolder.keys()].sort();
    logger.info(`Reviewing images in ${folders.length} folders`, { root });

    for (const folder of folders) {
      for (const file of byFolder.get(folder) ?? []) {
        const decision = await this.decisions.decideImage(file);
        report.reviewed += 1;

        if (decision === 'quit') {
          report.aborted = true;
          return report;
        }
        if (decision === 'skip_folder') {
          report.skippedFolders += 1;
          break;
        }

        switch (decision) {
          case 'keep':
            report.kept += 1;
            break;
          case 'junk':
            await this.trash(file, root, report);
            break;
          case 'meme':
            this.moveToMemes(file, memesDir, root, report);
            break;
        }
      }
    }

    return report;
  }

  private async listMedia(root: string): Promise<string[]> {
    const files = await fg('**/*', {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      dot: false,
      followSymbolicLinks: false,
      suppressErrors: true,
    });
    return files.filter(file => isMediaFile(file, this.config)).sort();
  }

  private async trash(file: string, root: string, report: ReviewReport): Promise<void> {
    const outcome = await this.reclaimer.trashAndPrune(file, root);
    if (outcome.status === 'trashed') {
      report.trashed += 1;
    } else if (outcome.status === 'failed') {
      report.failed += 1;
    }
  }

  private moveToMemes(file: string, memesDir: string, root: string, report: ReviewReport): void {
    const outcome = moveFileInto(file, memesDir);
    if (outcome.status === 'moved') {
      report.memes += 1;
      pruneEmptyAncestors(dirname(file), root);
    } else if (outcome.status === 'skipped' && outcome.reason !== 'vanished') {
      report.failed += 1;
      logger.warn(outcome.message);
    }
  }
}
