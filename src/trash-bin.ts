import trash from 'trash';

/**
 * Reversible delete. Nothing in the engines removes a file permanently.
 */
export interface TrashBin {
  trash(filePath: string): Promise<void>;
}

export class SystemTrashBin implements TrashBin {
  async trash(filePath: string): Promise<void> {
    // Paths like "IMG_1 (2).jpg" must not be read as glob patterns
    await trash(filePath, { glob: false });
  }
}
