import { describe, it, expect, vi } from 'vitest';
import { PassThrough } from 'stream';
import {
  PromptDecisionSource,
  createReadlinePrompt,
  formatDuplicateQuestion,
  parseDuplicateAnswer,
  parseFolderAnswer,
  parseImageAnswer,
  parseLivePhotoAnswer,
} from './prompt-decision-source.js';
import type { DuplicateGroup } from './types.js';

const group: DuplicateGroup = {
  size: 12,
  hash: 'abc',
  members: ['/photos/2021/03-March/A.jpg', '/photos/A (2).jpg'],
  canonicalIndex: 0,
};

describe('answer parsing', () => {
  it('should read folder answers by letter or word', () => {
    expect(parseFolderAnswer('k')).toBe('keep');
    expect(parseFolderAnswer(' Inside ')).toBe('sort_inside');
    expect(parseFolderAnswer('Y')).toBe('sort_into_years');
    expect(parseFolderAnswer('skip')).toBe('skip');
    expect(parseFolderAnswer('q')).toBe('quit');
    expect(parseFolderAnswer('x')).toBeNull();
    expect(parseFolderAnswer('toString')).toBeNull();
  });

  it('should read duplicate answers', () => {
    expect(parseDuplicateAnswer('', 2)).toEqual({ action: 'confirm_default' });
    expect(parseDuplicateAnswer('y', 2)).toEqual({ action: 'confirm_default' });
    expect(parseDuplicateAnswer('2', 2)).toEqual({ action: 'keep', index: 1 });
    expect(parseDuplicateAnswer('a', 2)).toEqual({ action: 'keep_all' });
    expect(parseDuplicateAnswer('D', 2)).toEqual({ action: 'delete_all' });
    expect(parseDuplicateAnswer('quit', 2)).toEqual({ action: 'quit' });
  });

  it('should reject member numbers outside the group', () => {
    expect(parseDuplicateAnswer('0', 2)).toBeNull();
    expect(parseDuplicateAnswer('3', 2)).toBeNull();
    expect(parseDuplicateAnswer('1.5', 2)).toBeNull();
  });

  it('should read live-photo and image answers', () => {
    expect(parseLivePhotoAnswer('d')).toBe('delete');
    expect(parseLivePhotoAnswer('junk')).toBeNull();
    expect(parseImageAnswer('m')).toBe('meme');
    expect(parseImageAnswer('s')).toBe('skip_folder');
    expect(parseImageAnswer('delete')).toBeNull();
  });
});

describe('formatDuplicateQuestion', () => {
  it('should number the members and mark the default', () => {
    expect(formatDuplicateQuestion(group, 0)).toBe(
      [
        'Identical files (12 bytes):',
        '  * 1) /photos/2021/03-March/A.jpg',
        '    2) /photos/A (2).jpg',
        '[Enter] keep 1, [1-2] keep another, [a]ll keep, [d]elete all, [q]uit: ',
      ].join('\n')
    );
  });
});

describe('PromptDecisionSource', () => {
  it('should ask again until an answer parses', async () => {
    const ask = vi.fn<(question: string) => Promise<string>>();
    ask.mockResolvedValueOnce('maybe').mockResolvedValueOnce('i');
    const source = new PromptDecisionSource(ask);

    await expect(source.decideFolder('/photos/Trip')).resolves.toBe('sort_inside');
    expect(ask).toHaveBeenCalledTimes(2);
    expect(ask.mock.calls[0][0]).toContain("Folder 'Trip'");
  });

  it('should treat an empty relocation answer as staying put', async () => {
    const source = new PromptDecisionSource(vi.fn().mockResolvedValueOnce('  ').mockResolvedValueOnce(' /albums '));

    await expect(source.pickRelocationTarget('/photos/Trip')).resolves.toBeNull();
    await expect(source.pickRelocationTarget('/photos/Trip')).resolves.toBe('/albums');
  });

  it('should map a member number to its index', async () => {
    const source = new PromptDecisionSource(vi.fn().mockResolvedValue('2'));
    await expect(source.decideDuplicate(group, 0)).resolves.toEqual({ action: 'keep', index: 1 });
  });

  it('should answer review questions', async () => {
    const source = new PromptDecisionSource(vi.fn().mockResolvedValueOnce('k').mockResolvedValueOnce('j'));
    await expect(source.decideLivePhoto('/photos/A-Live.mov')).resolves.toBe('keep');
    await expect(source.decideImage('/photos/a.jpg')).resolves.toBe('junk');
  });
});

describe('createReadlinePrompt', () => {
  it('should read one line per question', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompt = createReadlinePrompt(input, output);

    const answer = prompt.ask('Photo folder: ');
    input.write('/photos\n');

    await expect(answer).resolves.toBe('/photos');
    prompt.close();
  });
});
