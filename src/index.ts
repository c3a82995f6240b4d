/**
 * Library entry point
 */

export * from './types.js';
export {
  ConfigManager,
  DEFAULT_CONFIG,
  createSorterConfig,
  mergeConfigs,
  normalizeUserConfig,
  type AppConfig,
  type SorterConfig,
  type UserConfig,
} from './config.js';
export { AppError, Logger, handleError, logger, type LogLevel } from './logger.js';
export {
  calendarKey,
  formatMonthFolder,
  resolveEarliestTimestamp,
  toCalendarDate,
  type TimestampResolver,
} from './timestamp-resolver.js';
export { inferBackupDate, isBackupFolderName, parseBackupDate } from './backup-date.js';
export { MediaClassifier, classifyFolderName } from './media-classifier.js';
export { isMediaFile, isSidecarName } from './media-files.js';
export { ExifToolMetadataReader, NullMetadataReader, type MetadataReader } from './metadata-reader.js';
export { SystemTrashBin, type TrashBin } from './trash-bin.js';
export { moveDirectoryInto, moveFileInto, uniqueDestination, type MoveOutcome } from './file-mover.js';
export { SidecarReclaimer, pruneEmptyAncestors, type PurgeResult } from './sidecar-reclaimer.js';
export * from './decision-source.js';
export { SortEngine, type SortEngineOptions } from './sort-engine.js';
export {
  DuplicateEngine,
  chooseCanonicalIndex,
  hashFile,
  isAuxiliaryStem,
  type DuplicateEngineOptions,
  type HashProgress,
} from './duplicate-engine.js';
export { ReviewEngine, type ReviewEngineOptions } from './review-engine.js';
export { PromptDecisionSource, createReadlinePrompt } from './prompt-decision-source.js';
export { ProgressTracker } from './progress.js';
