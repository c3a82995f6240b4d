import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdirSync } from 'fs';
import { join } from 'path';
import {
  FailingTrashBin,
  FakeTrashBin,
  exists,
  listTree,
  makeTempRoot,
  removeTree,
  testConfig,
  writeMedia,
} from '../tests/helpers.js';
import { SidecarReclaimer, pruneEmptyAncestors } from './sidecar-reclaimer.js';

const day = new Date(2020, 5, 1);

describe('pruneEmptyAncestors', () => {
  let root: string;

  afterEach(() => {
    removeTree(root);
  });

  it('should remove empty folders upward and stop at the first non-empty one', () => {
    root = makeTempRoot('prune');
    writeMedia(root, 'a/keep.jpg', day);
    mkdirSync(join(root, 'a', 'b', 'c'), { recursive: true });

    const removed = pruneEmptyAncestors(join(root, 'a', 'b', 'c'), root);

    expect(removed).toEqual([join(root, 'a', 'b', 'c'), join(root, 'a', 'b')]);
    expect(exists(root, 'a')).toBe(true);
  });

  it('should never remove the root itself', () => {
    root = makeTempRoot('prune');
    mkdirSync(join(root, 'only'));

    expect(pruneEmptyAncestors(join(root, 'only'), root)).toEqual([join(root, 'only')]);
    expect(exists(root, '')).toBe(true);
    expect(pruneEmptyAncestors(root, root)).toEqual([]);
  });

  it('should ignore folders outside the root', () => {
    root = makeTempRoot('prune');
    const outside = makeTempRoot('prune-outside');
    try {
      expect(pruneEmptyAncestors(outside, root)).toEqual([]);
      expect(exists(outside, '')).toBe(true);
    } finally {
      removeTree(outside);
    }
  });
});

describe('SidecarReclaimer', () => {
  const config = testConfig();
  let root: string;

  afterEach(() => {
    removeTree(root);
    vi.restoreAllMocks();
  });

  it('should trash every sidecar and prune the folders they leave empty', async () => {
    root = makeTempRoot('sidecars');
    writeMedia(root, 'Trip/IMG_1.jpg', day);
    writeMedia(root, 'Trip/IMG_1.AAE', day);
    writeMedia(root, 'Trip/._IMG_1.jpg', day);
    writeMedia(root, 'Old/Thumbs.db', day);
    writeMedia(root, 'Cam/Index/MOV001.MODD', day);
    const trashBin = new FakeTrashBin();

    const result = await new SidecarReclaimer(config, trashBin).purge(root);

    expect(result).toEqual({
      trashed: [
        join(root, 'Cam/Index/MOV001.MODD'),
        join(root, 'Old/Thumbs.db'),
        join(root, 'Trip/._IMG_1.jpg'),
        join(root, 'Trip/IMG_1.AAE'),
      ],
      failed: 0,
      prunedDirectories: 3,
    });
    expect(listTree(root)).toEqual(['Trip/IMG_1.jpg']);
  });

  it('should count sidecars that cannot be trashed and keep going', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    root = makeTempRoot('sidecars');
    writeMedia(root, 'a.aae', day);
    writeMedia(root, 'b.aae', day);

    const result = await new SidecarReclaimer(config, new FailingTrashBin()).purge(root);

    expect(result).toEqual({ trashed: [], failed: 2, prunedDirectories: 0 });
    expect(listTree(root)).toEqual(['a.aae', 'b.aae']);
  });

  it('should treat a file that vanished before trashing as no failure', async () => {
    root = makeTempRoot('sidecars');
    const reclaimer = new SidecarReclaimer(config, new FakeTrashBin());

    await expect(reclaimer.trashAndPrune(join(root, 'gone.aae'), root)).resolves.toEqual({ status: 'vanished' });
  });
});
