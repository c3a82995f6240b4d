/**
 * Duplicate Engine
 *
 * Groups byte-identical media by (size, content hash), picks a default
 * canonical copy per group, and applies the decision source's verdict.
 * Only the hashing phase runs concurrently; the map of results is built by
 * the caller once every hash has settled.
 */

import { createHash } from 'crypto';
import { createReadStream, statSync } from 'fs';
import { basename, dirname, relative, sep } from 'path';
import fg from 'fast-glob';
import pLimit from 'p-limit';
import type { SorterConfig } from './config.js';
import type { DuplicateDecisionSource } from './decision-source.js';
import { resolveRootDirectory } from './file-mover.js';
import { AppError, Logger, describeError, isErrnoException } from './logger.js';
import { classifyFolderName } from './media-classifier.js';
import { isMediaFile, stemOf } from './media-files.js';
import type { SidecarReclaimer } from './sidecar-reclaimer.js';
import { resolveEarliestTimestamp, type TimestampResolver } from './timestamp-resolver.js';
import type { DuplicateGroup, DuplicateReport, LocationKind } from './types.js';

const logger = new Logger({ context: 'duplicate-engine' });

const PARENTHESISED_COPY = /\(\d+\)$/;
const SPACED_NUMBER = /\s+\d+$/;
const TRAILING_NUMBER = /(\d+)$/;

const LOCATION_RANK: Record<LocationKind, number> = {
  date: 0,
  generated: 1,
  other: 2,
  backup: 3,
};

export type HashProgress = (done: number, total: number) => void;

export interface DuplicateEngineOptions {
  config: SorterConfig;
  reclaimer: SidecarReclaimer;
  decisions: DuplicateDecisionSource;
  resolveTimestamp?: TimestampResolver;
  onProgress?: HashProgress;
}

interface SizedFile {
  path: string;
  size: number;
}

interface Candidate {
  index: number;
  path: string;
  auxiliary: boolean;
  trailingNumber: bigint | null;
  timestamp: number;
  location: LocationKind;
}

/**
 * Streaming whole-file digest
 */
export function hashFile(filePath: string, algorithm: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const digest = createHash(algorithm);
    const stream = createReadStream(filePath);

    stream.on('error', error => reject(error));
    stream.on('data', chunk => digest.update(chunk));
    stream.on('end', () => resolve(digest.digest('hex')));
  });
}

/**
 * Copies made by phones, file managers and our own collision rule:
 * `IMG_1 (2)`, `IMG_1 2`, `IMG_1-Live`
 */
export function isAuxiliaryStem(stem: string, livePhotoSuffix: string): boolean {
  return (
    PARENTHESISED_COPY.test(stem) ||
    SPACED_NUMBER.test(stem) ||
    stem.toLowerCase().endsWith(livePhotoSuffix.toLowerCase())
  );
}

/**
 * Exact value of the digits ending a stem, or null when it ends otherwise.
 * Camera names carry digit runs too long for a double.
 */
export function trailingNumber(stem: string): bigint | null {
  const match = TRAILING_NUMBER.exec(stem);
  return match ? BigInt(match[1]) : null;
}

function smallestTrailingNumber(values: Array<bigint | null>): bigint | null {
  return values.reduce<bigint | null>(
    (best, value) => (value !== null && (best === null || value < best) ? value : best),
    null
  );
}

/**
 * Kind of folder a member lives in, judged from its path below the root
 */
export function locationOf(filePath: string, root: string, config: SorterConfig): LocationKind {
  const folders = relative(root, dirname(filePath)).split(sep).filter(part => part.length > 0);

  if (
    folders.length >= 2 &&
    classifyFolderName(folders[0], config) === 'year' &&
    classifyFolderName(folders[1], config) === 'month'
  ) {
    return 'date';
  }
  if (folders.length >= 1 && classifyFolderName(folders[0], config) === 'generated') {
    return 'generated';
  }
  if (folders.some(part => classifyFolderName(part, config) === 'backup')) {
    return 'backup';
  }
  return 'other';
}

function earliest(candidates: Candidate[]): Candidate {
  return candidates.reduce((best, candidate) => (candidate.timestamp < best.timestamp ? candidate : best));
}

/**
 * Default surviving member of a group. Members are considered in their
 * (lexicographic) order, so every tie resolves to the first path.
 */
export function chooseCanonicalIndex(
  group: Pick<DuplicateGroup, 'members'>,
  root: string,
  config: SorterConfig,
  resolveTimestamp: TimestampResolver = resolveEarliestTimestamp
): number {
  if (group.members.length === 0) {
    throw new AppError('Duplicate group has no members', 'INVALID_DECISION', 400);
  }

  let candidates: Candidate[] = group.members.map((path, index) => {
    const stem = stemOf(path);
    return {
      index,
      path,
      auxiliary: isAuxiliaryStem(stem, config.livePhotoSuffix),
      trailingNumber: trailingNumber(stem),
      timestamp: resolveTimestamp(path).getTime(),
      location: locationOf(path, root, config),
    };
  });

  const originals = candidates.filter(candidate => !candidate.auxiliary);
  if (originals.length > 0) {
    candidates = originals;
  }
  if (candidates.length === 1) return candidates[0].index;

  const smallest = smallestTrailingNumber(candidates.map(candidate => candidate.trailingNumber));
  candidates = candidates.filter(candidate => candidate.trailingNumber === smallest);
  if (candidates.length === 1) return candidates[0].index;

  const dated = candidates.filter(candidate => candidate.location === 'date');
  if (dated.length > 0) return earliest(dated).index;

  const generated = candidates.filter(candidate => candidate.location === 'generated');
  if (generated.length > 0) return earliest(generated).index;

  const first = earliest(candidates);
  const tied = candidates.filter(candidate => candidate.timestamp === first.timestamp);
  if (tied.length === 1) return first.index;

  const bestRank = Math.min(...tied.map(candidate => LOCATION_RANK[candidate.location]));
  const ranked = tied.filter(candidate => LOCATION_RANK[candidate.location] === bestRank);
  return ranked[0].index;
}

export function createDuplicateReport(root: string): DuplicateReport {
  return { root, groups: 0, resolved: 0, keptAll: 0, deletedAll: 0, trashed: 0, failed: 0, aborted: false };
}

export class DuplicateEngine {
  private readonly config: SorterConfig;
  private readonly reclaimer: SidecarReclaimer;
  private readonly decisions: DuplicateDecisionSource;
  private readonly resolveTimestamp: TimestampResolver;
  private readonly onProgress?: HashProgress;

  constructor(options: DuplicateEngineOptions) {
    this.config = options.config;
    this.reclaimer = options.reclaimer;
    this.decisions = options.decisions;
    this.resolveTimestamp = options.resolveTimestamp ?? resolveEarliestTimestamp;
    this.onProgress = options.onProgress;
  }

  /**
   * Every group of two or more byte-identical media files under `rootPath`
   */
  async findGroups(rootPath: string): Promise<DuplicateGroup[]> {
    const root = resolveRootDirectory(rootPath);
    const candidates = await this.sizeCandidates(root);
    const hashes = await this.hashCandidates(candidates);

    const buckets = new Map<string, { size: number; hash: string; members: string[] }>();
    for (const [index, file] of candidates.entries()) {
      const hash = hashes[index];
      if (hash === null) continue;
      const key = `${file.size}:${hash}`;
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.members.push(file.path);
      } else {
        buckets.set(key, { size: file.size, hash, members: [file.path] });
      }
    }

    const groups: DuplicateGroup[] = [];
    for (const bucket of buckets.values()) {
      if (bucket.members.length < 2) continue;
      const members = [...bucket.members].sort();
      groups.push({
        size: bucket.size,
        hash: bucket.hash,
        members,
        canonicalIndex: chooseCanonicalIndex({ members }, root, this.config, this.resolveTimestamp),
      });
    }

    groups.sort((left, right) => (left.members[0] < right.members[0] ? -1 : left.members[0] > right.members[0] ? 1 : 0));
    logger.info(`Found ${groups.length} duplicate groups`, { root, hashed: candidates.length });
    return groups;
  }

  /**
   * Ask about each group in turn and apply the answer
   */
  async resolve(rootPath: string, groups: DuplicateGroup[]): Promise<DuplicateReport> {
    const root = resolveRootDirectory(rootPath);
    const report = createDuplicateReport(root);
    report.groups = groups.length;

    for (const group of groups) {
      const decision = await this.decisions.decideDuplicate(group, group.canonicalIndex);

      switch (decision.action) {
        case 'quit':
          report.aborted = true;
          logger.info('Duplicate resolution stopped on request');
          return report;

        case 'keep_all':
          report.keptAll += 1;
          break;

        case 'delete_all':
          await this.trashMembers(group.members, root, report);
          report.deletedAll += 1;
          break;

        case 'confirm_default':
        case 'keep': {
          const keep = decision.action === 'keep' ? decision.index : group.canonicalIndex;
          if (!Number.isInteger(keep) || keep < 0 || keep >= group.members.length) {
            throw new AppError(
              `Cannot keep member ${keep} of a group with ${group.members.length} files`,
              'INVALID_DECISION',
              400,
              { members: group.members }
            );
          }
          await this.trashMembers(
            group.members.filter((_, index) => index !== keep),
            root,
            report
          );
          report.resolved += 1;
          break;
        }
      }
    }

    return report;
  }

  private async trashMembers(members: string[], root: string, report: DuplicateReport): Promise<void> {
    for (const member of members) {
      const outcome = await this.reclaimer.trashAndPrune(member, root);
      if (outcome.status === 'trashed') {
        report.trashed += 1;
      } else if (outcome.status === 'failed') {
        report.failed += 1;
      }
    }
  }

  /**
   * Media files that share their size with at least one other file
   */
  private async sizeCandidates(root: string): Promise<SizedFile[]> {
    const paths = await fg('**/*', {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      dot: false,
      followSymbolicLinks: false,
      suppressErrors: true,
    });

    const bySize = new Map<number, SizedFile[]>();
    for (const path of paths.filter(file => isMediaFile(file, this.config)).sort()) {
      const stats = statSync(path, { throwIfNoEntry: false });
      if (!stats) continue;
      const sized = bySize.get(stats.size) ?? [];
      sized.push({ path, size: stats.size });
      bySize.set(stats.size, sized);
    }

    const candidates: SizedFile[] = [];
    for (const files of bySize.values()) {
      if (files.length > 1) candidates.push(...files);
    }
    return candidates.sort((left, right) => (left.path < right.path ? -1 : left.path > right.path ? 1 : 0));
  }

  private async hashCandidates(candidates: SizedFile[]): Promise<Array<string | null>> {
    const limit = pLimit(this.config.hashConcurrency);
    let done = 0;

    return Promise.all(
      candidates.map(file =>
        limit(async () => {
          try {
            return await hashFile(file.path, this.config.hashAlgorithm);
          } catch (error) {
            if (!isErrnoException(error, 'ENOENT')) {
              logger.warn(`Could not hash ${basename(file.path)}`, { path: file.path, error: describeError(error) });
            }
            return null;
          } finally {
            done += 1;
            this.onProgress?.(done, candidates.length);
          }
        })
      )
    );
  }
}
