import { mkdirSync, mkdtempSync, readdirSync, rmSync, statSync, utimesSync, writeFileSync } from 'fs';
import { dirname, join, relative, sep } from 'path';
import { createSorterConfig, DEFAULT_CONFIG, mergeConfigs, type SorterConfig, type UserConfig } from '../src/config.js';
import type {
  DecisionSource,
  DuplicateDecision,
  FolderDecision,
  ImageDecision,
  LivePhotoDecision,
} from '../src/decision-source.js';
import type { MetadataReader } from '../src/metadata-reader.js';
import type { TrashBin } from '../src/trash-bin.js';
import type { DuplicateGroup } from '../src/types.js';

export function testConfig(overrides: UserConfig = {}): SorterConfig {
  return createSorterConfig(mergeConfigs(DEFAULT_CONFIG, { duplicates: { concurrency: 2 }, ...overrides }));
}

/**
 * Fresh scratch directory under .test-tmp
 */
export function makeTempRoot(prefix: string): string {
  mkdirSync(globalThis.TEST_DIR, { recursive: true });
  return mkdtempSync(join(globalThis.TEST_DIR, `${prefix}-`));
}

export function removeTree(dirPath: string): void {
  rmSync(dirPath, { recursive: true, force: true });
}

/**
 * Write a file (creating parents) and backdate it. `date` must lie in the
 * past so the mtime, not the creation time, is the earliest timestamp.
 */
export function writeMedia(root: string, relPath: string, date: Date, content: string = relPath): string {
  const filePath = join(root, relPath);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  utimesSync(filePath, date, date);
  return filePath;
}

/**
 * Every file under `root`, as sorted forward-slash relative paths
 */
export function listTree(root: string): string[] {
  const files: string[] = [];
  const stack = [root];
  for (let dir = stack.pop(); dir !== undefined; dir = stack.pop()) {
    for (const name of readdirSync(dir)) {
      const entry = join(dir, name);
      if (statSync(entry).isDirectory()) {
        stack.push(entry);
      } else {
        files.push(relative(root, entry).split(sep).join('/'));
      }
    }
  }
  return files.sort();
}

export function exists(root: string, relPath: string): boolean {
  return statSync(join(root, relPath), { throwIfNoEntry: false }) !== undefined;
}

/**
 * Records what was trashed, then removes it from disk
 */
export class FakeTrashBin implements TrashBin {
  readonly trashed: string[] = [];

  async trash(filePath: string): Promise<void> {
    statSync(filePath);
    this.trashed.push(filePath);
    rmSync(filePath, { recursive: true });
  }
}

export class FailingTrashBin implements TrashBin {
  async trash(filePath: string): Promise<void> {
    throw new Error(`trash unavailable for ${filePath}`);
  }
}

/**
 * Software tags keyed by file basename
 */
export class StubMetadataReader implements MetadataReader {
  readonly reads: string[] = [];

  constructor(private readonly tags: Record<string, string[]> = {}) {}

  async readSoftwareTags(filePath: string): Promise<string[]> {
    this.reads.push(filePath);
    const name = filePath.split(sep).pop() ?? filePath;
    return this.tags[name] ?? [];
  }

  async close(): Promise<void> {}
}

export interface ScriptedAnswers {
  folders?: Record<string, FolderDecision>;
  relocations?: Record<string, string>;
  duplicates?: DuplicateDecision[];
  livePhotos?: LivePhotoDecision[];
  images?: ImageDecision[];
}

/**
 * Decision source answering from fixed tables and queues, recording every question
 */
export class ScriptedDecisionSource implements DecisionSource {
  readonly askedFolders: string[] = [];
  readonly askedDuplicates: Array<{ group: DuplicateGroup; defaultIndex: number }> = [];
  readonly askedLivePhotos: string[] = [];
  readonly askedImages: string[] = [];

  constructor(private readonly answers: ScriptedAnswers = {}) {}

  async decideFolder(folderPath: string): Promise<FolderDecision> {
    this.askedFolders.push(folderPath);
    const name = folderPath.split(sep).pop() ?? folderPath;
    return this.answers.folders?.[name] ?? 'keep';
  }

  async pickRelocationTarget(folderPath: string): Promise<string | null> {
    const name = folderPath.split(sep).pop() ?? folderPath;
    return this.answers.relocations?.[name] ?? null;
  }

  async decideDuplicate(group: DuplicateGroup, defaultIndex: number): Promise<DuplicateDecision> {
    this.askedDuplicates.push({ group, defaultIndex });
    return this.answers.duplicates?.shift() ?? { action: 'confirm_default' };
  }

  async decideLivePhoto(filePath: string): Promise<LivePhotoDecision> {
    this.askedLivePhotos.push(filePath);
    return this.answers.livePhotos?.shift() ?? 'keep';
  }

  async decideImage(filePath: string): Promise<ImageDecision> {
    this.askedImages.push(filePath);
    return this.answers.images?.shift() ?? 'keep';
  }
}
