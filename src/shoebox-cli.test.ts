import { describe, it, expect, afterEach } from 'vitest';
import {
  FakeTrashBin,
  ScriptedDecisionSource,
  StubMetadataReader,
  listTree,
  makeTempRoot,
  removeTree,
  testConfig,
  writeMedia,
} from '../tests/helpers.js';
import { AppError } from './logger.js';
import { formatDuplicateReport, formatSortReport, parseArgs, run } from './shoebox-cli.js';
import { createSortReport } from './types.js';

describe('parseArgs', () => {
  it('should default to an interactive sort', () => {
    expect(parseArgs([])).toEqual({
      mode: 'sort',
      configPath: './shoebox.yaml',
      strongSort: false,
      yes: false,
      help: false,
    });
  });

  it('should read every option', () => {
    expect(
      parseArgs(['--root', '/photos', '--config', 'my.yaml', '--strong-sort', '--yes', '--log-level', 'DEBUG'])
    ).toEqual({
      mode: 'sort',
      root: '/photos',
      configPath: 'my.yaml',
      strongSort: true,
      yes: true,
      logLevel: 'debug',
      help: false,
    });
    expect(parseArgs(['--duplicates']).mode).toBe('duplicates');
    expect(parseArgs(['--live']).mode).toBe('live');
    expect(parseArgs(['--review', '-h'])).toMatchObject({ mode: 'review', help: true });
  });

  it('should reject conflicting or malformed arguments', () => {
    expect(() => parseArgs(['--duplicates', '--live'])).toThrow('--duplicates and --live cannot be combined');
    expect(() => parseArgs(['--duplicates', '--strong-sort'])).toThrow('--strong-sort only applies to a sort run');
    expect(() => parseArgs(['--root'])).toThrow('--root needs a value');
    expect(() => parseArgs(['--root', '--yes'])).toThrow('--root needs a value');
    expect(() => parseArgs(['--log-level', 'loud'])).toThrow('Unknown log level: loud');
    expect(() => parseArgs(['photos'])).toThrow(AppError);
  });
});

describe('report formatting', () => {
  it('should summarize a sort', () => {
    const report = { ...createSortReport('/photos'), moved: 2, unchanged: 3, backupsArchived: 1 };
    expect(formatSortReport(report)).toEqual([
      'Moved 2 files, left 3 in place, skipped 0',
      'Trashed 0 sidecar files, pruned 0 empty folders',
      'Backups: 1 archived, 0 dispersed',
      'Folders: 0 sorted, 0 kept, 0 relocated, 0 skipped',
    ]);
  });

  it('should lead with the abort notice', () => {
    const lines = formatDuplicateReport({
      root: '/photos',
      groups: 3,
      resolved: 1,
      keptAll: 0,
      deletedAll: 0,
      trashed: 1,
      failed: 1,
      aborted: true,
    });
    expect(lines).toEqual([
      'Duplicate review aborted',
      '3 duplicate groups: 1 resolved, 0 kept whole, 0 deleted whole',
      'Trashed 1 files, 1 could not be trashed',
    ]);
  });
});

describe('run', () => {
  const config = testConfig();
  let root: string;

  afterEach(() => {
    removeTree(root);
  });

  it('should sort and then review images with --strong-sort', async () => {
    root = makeTempRoot('cli');
    writeMedia(root, 'a.jpg', new Date(2020, 5, 1, 12));
    const decisions = new ScriptedDecisionSource({ images: ['meme'] });

    const summary = await run('sort', root, true, config, {
      decisions,
      metadata: new StubMetadataReader(),
      trashBin: new FakeTrashBin(),
    });

    expect(listTree(root)).toEqual(['Memes/a.jpg']);
    expect(summary.aborted).toBe(false);
    expect(summary.lines[summary.lines.length - 1]).toBe('Image review: reviewed 1, kept 0, trashed 0, memes 1');
  });

  it('should find and resolve duplicates', async () => {
    root = makeTempRoot('cli');
    writeMedia(root, '2021/03-March/A.jpg', new Date(2021, 2, 1, 12), 'pixels');
    writeMedia(root, 'A (2).jpg', new Date(2021, 2, 9, 12), 'pixels');
    const trashBin = new FakeTrashBin();
    const progress: number[] = [];

    const summary = await run('duplicates', root, false, config, {
      decisions: new ScriptedDecisionSource(),
      metadata: new StubMetadataReader(),
      trashBin,
      onHashProgress: done => progress.push(done),
    });

    expect(listTree(root)).toEqual(['2021/03-March/A.jpg']);
    expect(progress).toHaveLength(2);
    expect(summary.lines).toEqual([
      '1 duplicate groups: 1 resolved, 0 kept whole, 0 deleted whole',
      'Trashed 1 files',
    ]);
  });

  it('should report a quit as aborted', async () => {
    root = makeTempRoot('cli');
    writeMedia(root, 'x-Live.mov', new Date(2020, 5, 1, 12));

    const summary = await run('live', root, false, config, {
      decisions: new ScriptedDecisionSource({ livePhotos: ['quit'] }),
      metadata: new StubMetadataReader(),
      trashBin: new FakeTrashBin(),
    });

    expect(summary).toEqual({
      aborted: true,
      lines: ['Live-photo review aborted', 'Live-photo review: reviewed 1, kept 0, trashed 0, memes 0'],
    });
  });

  it('should fail on a missing root', async () => {
    root = makeTempRoot('cli');
    await expect(
      run('review', `${root}/missing`, false, config, {
        decisions: new ScriptedDecisionSource(),
        metadata: new StubMetadataReader(),
        trashBin: new FakeTrashBin(),
      })
    ).rejects.toThrow('Root folder does not exist');
  });
});
