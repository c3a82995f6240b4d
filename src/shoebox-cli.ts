#!/usr/bin/env node
/**
 * shoebox: sort a photo tree into YYYY/MM-Month, fold backup dumps into it,
 * and clear out byte-identical copies.
 */

import { config as loadEnv } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager, type SorterConfig } from './config.js';
import { UnattendedDecisionSource, type DecisionSource } from './decision-source.js';
import { DuplicateEngine, type HashProgress } from './duplicate-engine.js';
import { AppError, Logger, describeError, parseLogLevel, type LogLevel } from './logger.js';
import { MediaClassifier } from './media-classifier.js';
import { ExifToolMetadataReader, type MetadataReader } from './metadata-reader.js';
import { ProgressTracker } from './progress.js';
import { createReadlinePrompt, PromptDecisionSource, type Prompt } from './prompt-decision-source.js';
import { ReviewEngine } from './review-engine.js';
import { SidecarReclaimer } from './sidecar-reclaimer.js';
import { SortEngine } from './sort-engine.js';
import { SystemTrashBin, type TrashBin } from './trash-bin.js';
import type { DuplicateReport, ReviewReport, SortReport } from './types.js';

loadEnv({ override: false });

const logger = new Logger({ context: 'shoebox-cli' });

export type Mode = 'sort' | 'duplicates' | 'live' | 'review';

export interface CliOptions {
  mode: Mode;
  root?: string;
  configPath: string;
  strongSort: boolean;
  yes: boolean;
  logLevel?: LogLevel;
  help: boolean;
}

export interface CliServices {
  decisions: DecisionSource;
  metadata: MetadataReader;
  trashBin: TrashBin;
  onHashProgress?: HashProgress;
}

export interface RunSummary {
  aborted: boolean;
  lines: string[];
}

const MODE_FLAGS: Record<string, Mode> = {
  '--duplicates': 'duplicates',
  '--live': 'live',
  '--review': 'review',
};

export function printUsage(): void {
  console.log(`Usage: shoebox [options]

Options:
  --root PATH         Folder to organize (or SHOEBOX_ROOT)
  --config FILE       YAML or JSON settings (default ./shoebox.yaml)
  --duplicates        Find byte-identical media and choose which copy stays
  --live              Review live-photo companion videos
  --review            Review every image: keep, junk or meme
  --strong-sort       Run the image review after sorting
  --yes               Answer every question with its default
  --log-level LEVEL   debug | info | warn | error
  -h, --help          Show this help`);
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    mode: 'sort',
    configPath: './shoebox.yaml',
    strongSort: false,
    yes: false,
    help: false,
  };
  let explicitMode: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg in MODE_FLAGS) {
      if (explicitMode && explicitMode !== arg) {
        throw new AppError(`${explicitMode} and ${arg} cannot be combined`, 'INVALID_ARGUMENT', 400);
      }
      explicitMode = arg;
      options.mode = MODE_FLAGS[arg];
      continue;
    }

    switch (arg) {
      case '--root':
      case '--config':
      case '--log-level': {
        const value = argv[++i];
        if (value === undefined || value.startsWith('--')) {
          throw new AppError(`${arg} needs a value`, 'INVALID_ARGUMENT', 400);
        }
        if (arg === '--root') {
          options.root = value;
        } else if (arg === '--config') {
          options.configPath = value;
        } else {
          const level = parseLogLevel(value);
          if (!level) {
            throw new AppError(`Unknown log level: ${value}`, 'INVALID_ARGUMENT', 400);
          }
          options.logLevel = level;
        }
        break;
      }
      case '--strong-sort':
        options.strongSort = true;
        break;
      case '--yes':
      case '-y':
        options.yes = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new AppError(`Unknown argument: ${arg}`, 'INVALID_ARGUMENT', 400);
    }
  }

  if (options.strongSort && options.mode !== 'sort') {
    throw new AppError('--strong-sort only applies to a sort run', 'INVALID_ARGUMENT', 400);
  }
  return options;
}

export function formatSortReport(report: SortReport): string[] {
  const lines = [
    `Moved ${report.moved} files, left ${report.unchanged} in place, skipped ${report.skipped}`,
    `Trashed ${report.sidecarsTrashed} sidecar files, pruned ${report.prunedDirectories} empty folders`,
    `Backups: ${report.backupsArchived} archived, ${report.backupsRemoved} dispersed`,
    `Folders: ${report.foldersSorted} sorted, ${report.foldersKept} kept, ${report.foldersRelocated} relocated, ${report.foldersSkipped} skipped`,
  ];
  return report.aborted ? ['Sort aborted', ...lines] : lines;
}

export function formatDuplicateReport(report: DuplicateReport): string[] {
  const lines = [
    `${report.groups} duplicate groups: ${report.resolved} resolved, ${report.keptAll} kept whole, ${report.deletedAll} deleted whole`,
    `Trashed ${report.trashed} files` + (report.failed > 0 ? `, ${report.failed} could not be trashed` : ''),
  ];
  return report.aborted ? ['Duplicate review aborted', ...lines] : lines;
}

export function formatReviewReport(title: string, report: ReviewReport): string[] {
  const lines = [
    `${title}: reviewed ${report.reviewed}, kept ${report.kept}, trashed ${report.trashed}, memes ${report.memes}`,
  ];
  if (report.skippedFolders > 0) lines.push(`Skipped ${report.skippedFolders} folders`);
  if (report.failed > 0) lines.push(`${report.failed} files could not be handled`);
  return report.aborted ? [`${title} aborted`, ...lines] : lines;
}

/**
 * One run of the selected mode against `root`
 */
export async function run(
  mode: Mode,
  root: string,
  strongSort: boolean,
  config: SorterConfig,
  services: CliServices
): Promise<RunSummary> {
  const reclaimer = new SidecarReclaimer(config, services.trashBin);
  const review = new ReviewEngine({ config, reclaimer, decisions: services.decisions });

  switch (mode) {
    case 'sort': {
      const classifier = new MediaClassifier(config, services.metadata);
      const engine = new SortEngine({ config, classifier, reclaimer, decisions: services.decisions });
      const report = await engine.run(root);
      const lines = formatSortReport(report);
      if (report.aborted || !strongSort) {
        return { aborted: report.aborted, lines };
      }
      const images = await review.reviewImages(root);
      return { aborted: images.aborted, lines: [...lines, ...formatReviewReport('Image review', images)] };
    }

    case 'duplicates': {
      const engine = new DuplicateEngine({
        config,
        reclaimer,
        decisions: services.decisions,
        onProgress: services.onHashProgress,
      });
      const groups = await engine.findGroups(root);
      const report = await engine.resolve(root, groups);
      return { aborted: report.aborted, lines: formatDuplicateReport(report) };
    }

    case 'live': {
      const report = await review.reviewLivePhotos(root);
      return { aborted: report.aborted, lines: formatReviewReport('Live-photo review', report) };
    }

    case 'review': {
      const report = await review.reviewImages(root);
      return { aborted: report.aborted, lines: formatReviewReport('Image review', report) };
    }
  }
}

async function resolveRoot(options: CliOptions, prompt: Prompt | null): Promise<string> {
  const fromArgs = options.root?.trim() || process.env.SHOEBOX_ROOT?.trim();
  if (fromArgs) return path.resolve(fromArgs);

  if (!prompt) {
    throw new AppError('--root is required when not running in a terminal', 'INVALID_ARGUMENT', 400);
  }
  const answer = (await prompt.ask('Photo folder to organize: ')).trim();
  if (!answer) {
    throw new AppError('No folder given', 'INVALID_ARGUMENT', 400);
  }
  return path.resolve(answer);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const options = parseArgs(argv);
  if (options.help) {
    printUsage();
    return;
  }

  const configManager = new ConfigManager(options.configPath);
  Logger.setDefaultLevel(options.logLevel ?? configManager.getConfig().logLevel);
  const config = configManager.toSorterConfig();

  const interactive = Boolean(process.stdin.isTTY);
  const prompt = interactive ? createReadlinePrompt() : null;
  const metadata = new ExifToolMetadataReader();
  let progress: ProgressTracker | null = null;

  try {
    const root = await resolveRoot(options, prompt);
    const decisions = options.yes || !prompt ? new UnattendedDecisionSource() : new PromptDecisionSource(prompt.ask);
    if (!options.yes && !prompt) {
      logger.warn('No terminal attached: every question takes its default answer');
    }

    const summary = await run(options.mode, root, options.strongSort, config, {
      decisions,
      metadata,
      trashBin: new SystemTrashBin(),
      onHashProgress: (done, total) => {
        progress ??= new ProgressTracker({ total, label: 'Hashing' });
        progress.update(done, total);
        if (done === total) progress.complete();
      },
    });

    for (const line of summary.lines) {
      console.log(line);
    }
  } finally {
    prompt?.close();
    await metadata.close();
  }
}

const currentScriptPath = fileURLToPath(import.meta.url);
const invokedScriptPath = process.argv[1] ? path.resolve(process.argv[1]) : '';

if (invokedScriptPath && currentScriptPath === invokedScriptPath) {
  main().catch(error => {
    console.error(error instanceof AppError ? error.message : describeError(error));
    process.exitCode = 1;
  });
}
