/**
 * Decision points the engines expose to a human (or a policy).
 * The engines never block on anything else.
 */

import type { DuplicateGroup } from './types.js';

export type FolderDecision = 'keep' | 'sort_inside' | 'sort_into_years' | 'skip' | 'quit';

export type DuplicateDecision =
  | { action: 'confirm_default' }
  | { action: 'keep'; index: number }
  | { action: 'keep_all' }
  | { action: 'delete_all' }
  | { action: 'quit' };

export type LivePhotoDecision = 'keep' | 'delete' | 'quit';

export type ImageDecision = 'keep' | 'junk' | 'meme' | 'skip_folder' | 'quit';

export interface FolderDecisionSource {
  /** Asked for an unclassified folder that still holds media */
  decideFolder(folderPath: string): Promise<FolderDecision>;
  /** Asked after `keep`: where to move the folder wholesale, or null to leave it */
  pickRelocationTarget(folderPath: string): Promise<string | null>;
}

export interface DuplicateDecisionSource {
  decideDuplicate(group: DuplicateGroup, defaultIndex: number): Promise<DuplicateDecision>;
}

export interface ReviewDecisionSource {
  decideLivePhoto(filePath: string): Promise<LivePhotoDecision>;
  decideImage(filePath: string): Promise<ImageDecision>;
}

export type DecisionSource = FolderDecisionSource & DuplicateDecisionSource & ReviewDecisionSource;

/**
 * Answers every question without asking: folders are kept where they are,
 * the default duplicate is confirmed, companions and images are kept.
 */
export class UnattendedDecisionSource implements DecisionSource {
  async decideFolder(): Promise<FolderDecision> {
    return 'keep';
  }

  async pickRelocationTarget(): Promise<string | null> {
    return null;
  }

  async decideDuplicate(): Promise<DuplicateDecision> {
    return { action: 'confirm_default' };
  }

  async decideLivePhoto(): Promise<LivePhotoDecision> {
    return 'keep';
  }

  async decideImage(): Promise<ImageDecision> {
    return 'keep';
  }
}
