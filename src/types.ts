/**
 * Shared types for the sorting, backup and duplicate engines.
 * Everything here is a transient view of the filesystem; nothing is persisted.
 */

export type MediaKind = 'plain' | 'screenshot' | 'screen_recording';

export type FolderKind = 'generated' | 'year' | 'month' | 'backup' | 'unclassified';

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export type DatePrecision = 'day' | 'month';

export interface ParsedBackupDate extends CalendarDate {
  precision: DatePrecision;
}

export type BackupInference =
  | { confidence: 'exact' | 'majority'; date: CalendarDate }
  | { confidence: 'unresolved'; date: null };

/**
 * Where a duplicate member sits, best rank first
 */
export type LocationKind = 'date' | 'generated' | 'other' | 'backup';

export interface DuplicateGroup {
  size: number;
  hash: string;
  /** Absolute paths in lexicographic order */
  members: string[];
  canonicalIndex: number;
}

export type WalkSignal =
  | { kind: 'continue' }
  | { kind: 'skip-subtree' }
  | { kind: 'abort' };

export interface SortReport {
  root: string;
  moved: number;
  unchanged: number;
  skipped: number;
  sidecarsTrashed: number;
  backupsArchived: number;
  backupsRemoved: number;
  foldersKept: number;
  foldersRelocated: number;
  foldersSkipped: number;
  foldersSorted: number;
  prunedDirectories: number;
  aborted: boolean;
  warnings: string[];
}

export interface DuplicateReport {
  root: string;
  groups: number;
  resolved: number;
  keptAll: number;
  deletedAll: number;
  trashed: number;
  failed: number;
  aborted: boolean;
}

export interface ReviewReport {
  root: string;
  reviewed: number;
  kept: number;
  trashed: number;
  memes: number;
  skippedFolders: number;
  failed: number;
  aborted: boolean;
}

export function createSortReport(root: string): SortReport {
  return {
    root,
    moved: 0,
    unchanged: 0,
    skipped: 0,
    sidecarsTrashed: 0,
    backupsArchived: 0,
    backupsRemoved: 0,
    foldersKept: 0,
    foldersRelocated: 0,
    foldersSkipped: 0,
    foldersSorted: 0,
    prunedDirectories: 0,
    aborted: false,
    warnings: [],
  };
}
