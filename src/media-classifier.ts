/**
 * Media and folder classification
 */

import { isBackupFolderName } from './backup-date.js';
import type { SorterConfig } from './config.js';
import { Logger, describeError } from './logger.js';
import { extensionOf, isImageFile, isVideoFile, stemOf } from './media-files.js';
import type { MetadataReader } from './metadata-reader.js';
import type { FolderKind, MediaKind } from './types.js';

const logger = new Logger({ context: 'media-classifier' });

export const YEAR_PATTERN = /^\d{4}$/;
export const MONTH_PATTERN = /^\d{2}-[A-Za-z]+$/; // 04-April, 11-November

const RECORDER_SOFTWARE = ['avfoundation', 'quicktime player', 'screen'];
const RECORDING_STEMS = ['screenrecording', 'screen recording'];

/**
 * Classify a folder by its basename alone.
 */
export function classifyFolderName(name: string, config: SorterConfig): FolderKind {
  if (config.generatedFolders.has(name)) return 'generated';
  if (YEAR_PATTERN.test(name)) return 'year';
  if (MONTH_PATTERN.test(name)) return 'month';
  if (isBackupFolderName(name)) return 'backup';
  return 'unclassified';
}

export class MediaClassifier {
  constructor(
    private readonly config: SorterConfig,
    private readonly metadata: MetadataReader
  ) {}

  async classifyFile(filePath: string): Promise<MediaKind> {
    if (await this.isScreenshot(filePath)) return 'screenshot';
    if (await this.isScreenRecording(filePath)) return 'screen_recording';
    return 'plain';
  }

  async isScreenshot(filePath: string): Promise<boolean> {
    if (extensionOf(filePath) === '.png') {
      return true;
    }
    if (!isImageFile(filePath, this.config)) {
      return false;
    }
    const software = await this.softwareTags(filePath);
    return software.some(value => value.toLowerCase().includes('screen'));
  }

  async isScreenRecording(filePath: string): Promise<boolean> {
    if (!isVideoFile(filePath, this.config)) {
      return false;
    }

    const stem = stemOf(filePath).toLowerCase();
    if (RECORDING_STEMS.some(marker => stem.includes(marker))) {
      return true;
    }

    const software = await this.softwareTags(filePath);
    return software.some(value => {
      const lower = value.toLowerCase();
      return RECORDER_SOFTWARE.some(marker => lower.includes(marker));
    });
  }

  private async softwareTags(filePath: string): Promise<string[]> {
    try {
      return await this.metadata.readSoftwareTags(filePath);
    } catch (error) {
      // Unreadable or corrupt containers classify as plain media
      logger.debug('Metadata unreadable', { filePath, error: describeError(error) });
      return [];
    }
  }
}
