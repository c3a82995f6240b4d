/**
 * Terminal adapter for the decision points: one readline question per
 * decision, repeated until the answer parses.
 */

import { createInterface } from 'readline';
import { basename } from 'path';
import type {
  DecisionSource,
  DuplicateDecision,
  FolderDecision,
  ImageDecision,
  LivePhotoDecision,
} from './decision-source.js';
import type { DuplicateGroup } from './types.js';

export type Ask = (question: string) => Promise<string>;

export interface Prompt {
  ask: Ask;
  close(): void;
}

export function createReadlinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompt {
  const rl = createInterface({ input, output });
  return {
    ask: question => new Promise(resolve => rl.question(question, answer => resolve(answer))),
    close: () => rl.close(),
  };
}

const FOLDER_ANSWERS: Record<string, FolderDecision> = {
  k: 'keep',
  keep: 'keep',
  i: 'sort_inside',
  inside: 'sort_inside',
  y: 'sort_into_years',
  years: 'sort_into_years',
  s: 'skip',
  skip: 'skip',
  q: 'quit',
  quit: 'quit',
};

const LIVE_PHOTO_ANSWERS: Record<string, LivePhotoDecision> = {
  k: 'keep',
  keep: 'keep',
  d: 'delete',
  delete: 'delete',
  q: 'quit',
  quit: 'quit',
};

const IMAGE_ANSWERS: Record<string, ImageDecision> = {
  k: 'keep',
  keep: 'keep',
  j: 'junk',
  junk: 'junk',
  m: 'meme',
  meme: 'meme',
  s: 'skip_folder',
  skip: 'skip_folder',
  q: 'quit',
  quit: 'quit',
};

function lookup<T>(table: Record<string, T>, answer: string): T | null {
  const key = answer.trim().toLowerCase();
  return Object.hasOwn(table, key) ? table[key] : null;
}

export function parseFolderAnswer(answer: string): FolderDecision | null {
  return lookup(FOLDER_ANSWERS, answer);
}

export function parseLivePhotoAnswer(answer: string): LivePhotoDecision | null {
  return lookup(LIVE_PHOTO_ANSWERS, answer);
}

export function parseImageAnswer(answer: string): ImageDecision | null {
  return lookup(IMAGE_ANSWERS, answer);
}

/**
 * Empty or `y` confirms the default; a 1-based member number keeps that member
 */
export function parseDuplicateAnswer(answer: string, memberCount: number): DuplicateDecision | null {
  const key = answer.trim().toLowerCase();
  switch (key) {
    case '':
    case 'y':
      return { action: 'confirm_default' };
    case 'a':
    case 'all':
      return { action: 'keep_all' };
    case 'd':
    case 'delete':
      return { action: 'delete_all' };
    case 'q':
    case 'quit':
      return { action: 'quit' };
  }

  if (!/^\d+$/.test(key)) return null;
  const choice = Number.parseInt(key, 10);
  return choice >= 1 && choice <= memberCount ? { action: 'keep', index: choice - 1 } : null;
}

export function formatDuplicateQuestion(group: DuplicateGroup, defaultIndex: number): string {
  const lines = group.members.map(
    (member, index) => `  ${index === defaultIndex ? '*' : ' '} ${index + 1}) ${member}`
  );
  return [
    `Identical files (${group.size} bytes):`,
    ...lines,
    `[Enter] keep ${defaultIndex + 1}, [1-${group.members.length}] keep another, [a]ll keep, [d]elete all, [q]uit: `,
  ].join('\n');
}

export class PromptDecisionSource implements DecisionSource {
  constructor(private readonly ask: Ask) {}

  private async askUntil<T>(question: string, parse: (answer: string) => T | null): Promise<T> {
    for (;;) {
      const parsed = parse(await this.ask(question));
      if (parsed !== null) return parsed;
    }
  }

  decideFolder(folderPath: string): Promise<FolderDecision> {
    return this.askUntil(
      `Folder '${basename(folderPath)}' (${folderPath})\n[k]eep, sort [i]nside, sort into [y]ears, [s]kip, [q]uit: `,
      parseFolderAnswer
    );
  }

  async pickRelocationTarget(folderPath: string): Promise<string | null> {
    const answer = await this.ask(`Move '${basename(folderPath)}' to (empty to leave it here): `);
    const target = answer.trim();
    return target.length > 0 ? target : null;
  }

  decideDuplicate(group: DuplicateGroup, defaultIndex: number): Promise<DuplicateDecision> {
    return this.askUntil(formatDuplicateQuestion(group, defaultIndex), answer =>
      parseDuplicateAnswer(answer, group.members.length)
    );
  }

  decideLivePhoto(filePath: string): Promise<LivePhotoDecision> {
    return this.askUntil(`Live-photo companion ${filePath}\n[k]eep, [d]elete, [q]uit: `, parseLivePhotoAnswer);
  }

  decideImage(filePath: string): Promise<ImageDecision> {
    return this.askUntil(
      `Image ${filePath}\n[k]eep, [j]unk, [m]eme, [s]kip folder, [q]uit: `,
      parseImageAnswer
    );
  }
}
