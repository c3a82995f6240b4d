/**
 * Embedded metadata backend used to spot screenshots and screen recordings
 */

import { ExifTool } from 'exiftool-vendored';

export interface MetadataReader {
  /**
   * Values of every tag that names the software which wrote the file
   */
  readSoftwareTags(filePath: string): Promise<string[]>;
  close(): Promise<void>;
}

// EXIF/XMP for stills, QuickTime keys for movies
const SOFTWARE_TAG_NAMES = new Set([
  'Software',
  'CreatorTool',
  'Encoder',
  'HandlerDescription',
  'CreationSoftware',
  'ComAppleQuicktimeSoftware',
]);

export function extractSoftwareTags(tags: object): string[] {
  const values: string[] = [];
  for (const [name, value] of Object.entries(tags)) {
    if (SOFTWARE_TAG_NAMES.has(name) && typeof value === 'string' && value.trim()) {
      values.push(value.trim());
    }
  }
  return values;
}

/**
 * Reads tags through a lazily started exiftool process; `close()` must run
 * before the process can exit.
 */
export class ExifToolMetadataReader implements MetadataReader {
  private exiftool: ExifTool | null = null;

  constructor(private readonly taskTimeoutMillis: number = 10_000) {}

  private client(): ExifTool {
    if (!this.exiftool) {
      this.exiftool = new ExifTool({ taskTimeoutMillis: this.taskTimeoutMillis });
    }
    return this.exiftool;
  }

  async readSoftwareTags(filePath: string): Promise<string[]> {
    const tags = await this.client().read(filePath);
    return extractSoftwareTags(tags);
  }

  async close(): Promise<void> {
    if (this.exiftool) {
      const running = this.exiftool;
      this.exiftool = null;
      await running.end();
    }
  }
}

/**
 * Backend for hosts without exiftool: every file reports no software tags
 */
export class NullMetadataReader implements MetadataReader {
  async readSoftwareTags(_filePath: string): Promise<string[]> {
    return [];
  }

  async close(): Promise<void> {}
}
