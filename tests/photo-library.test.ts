import { afterEach, describe, expect, it } from 'vitest';
import { join } from 'path';
import { DuplicateEngine } from '../src/duplicate-engine.js';
import { MediaClassifier } from '../src/media-classifier.js';
import { SidecarReclaimer } from '../src/sidecar-reclaimer.js';
import { SortEngine } from '../src/sort-engine.js';
import {
  FakeTrashBin,
  ScriptedDecisionSource,
  StubMetadataReader,
  listTree,
  makeTempRoot,
  removeTree,
  testConfig,
  writeMedia,
} from './helpers.js';

describe('photo library end to end', () => {
  const config = testConfig();
  let root: string;

  afterEach(() => {
    removeTree(root);
  });

  function buildLibrary(): void {
    root = makeTempRoot('library');
    writeMedia(root, '2019-09/a.jpg', new Date(2019, 8, 3, 9));
    writeMedia(root, '2019-09/b.jpg', new Date(2019, 8, 3, 10));
    writeMedia(root, '2019-09/c.jpg', new Date(2019, 8, 3, 11));
    writeMedia(root, '2019-09/d.jpg', new Date(2019, 7, 30, 12));
    writeMedia(root, '2019-09/e.jpg', new Date(2019, 7, 30, 13));
    writeMedia(root, '2019-09/a.AAE', new Date(2019, 8, 3, 9));
    writeMedia(root, 'IMG_9.jpg', new Date(2021, 2, 5, 12), 'same bytes');
    writeMedia(root, 'Phone/IMG_9.jpg', new Date(2021, 2, 5, 12), 'same bytes');
  }

  function createServices() {
    const trashBin = new FakeTrashBin();
    const decisions = new ScriptedDecisionSource({ folders: { Phone: 'sort_into_years' } });
    const reclaimer = new SidecarReclaimer(config, trashBin);
    const sorter = new SortEngine({
      config,
      classifier: new MediaClassifier(config, new StubMetadataReader()),
      reclaimer,
      decisions,
    });
    const duplicates = new DuplicateEngine({ config, reclaimer, decisions });
    return { trashBin, sorter, duplicates };
  }

  const sortedTree = [
    '2019/08-August/d.jpg',
    '2019/08-August/e.jpg',
    '2019/2019-09/a.jpg',
    '2019/2019-09/b.jpg',
    '2019/2019-09/c.jpg',
    '2021/03-March/IMG_9 (1).jpg',
    '2021/03-March/IMG_9.jpg',
  ];

  it('should sort the library and leave it untouched on a second pass', async () => {
    buildLibrary();
    const { sorter, trashBin } = createServices();

    const first = await sorter.run(root);

    expect(listTree(root)).toEqual(sortedTree);
    expect(trashBin.trashed).toEqual([join(root, '2019-09', 'a.AAE')]);
    expect(first).toMatchObject({ moved: 4, unchanged: 3, backupsArchived: 1, sidecarsTrashed: 1, foldersSorted: 1 });

    const second = await sorter.run(root);

    expect(listTree(root)).toEqual(sortedTree);
    expect(second.moved).toBe(0);
    expect(second.skipped).toBe(0);
  });

  it('should collapse the copy produced by a name collision', async () => {
    buildLibrary();
    const { sorter, duplicates, trashBin } = createServices();
    await sorter.run(root);

    const groups = await duplicates.findGroups(root);

    expect(groups).toHaveLength(1);
    expect(groups[0].members).toEqual([
      join(root, '2021/03-March/IMG_9 (1).jpg'),
      join(root, '2021/03-March/IMG_9.jpg'),
    ]);
    expect(groups[0].canonicalIndex).toBe(1);

    const report = await duplicates.resolve(root, groups);

    expect(report).toMatchObject({ groups: 1, resolved: 1, trashed: 1 });
    expect(trashBin.trashed[trashBin.trashed.length - 1]).toBe(join(root, '2021/03-March/IMG_9 (1).jpg'));
    expect(listTree(root)).toEqual(sortedTree.filter(path => !path.includes('(1)')));
  });
});
