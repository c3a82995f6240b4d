import { describe, it, expect } from 'vitest';
import { NullMetadataReader, extractSoftwareTags } from './metadata-reader.js';

describe('extractSoftwareTags', () => {
  it('should collect creation-software values from still and movie tags', () => {
    const tags = {
      Make: 'Apple',
      Software: 'Screenshot Tool',
      CreatorTool: ' Photo Editor 3 ',
      HandlerDescription: 'Core Media Video',
      ComAppleQuicktimeSoftware: '15.1',
    };

    expect(extractSoftwareTags(tags)).toEqual(['Screenshot Tool', 'Photo Editor 3', 'Core Media Video', '15.1']);
  });

  it('should skip blank and non-string values', () => {
    expect(extractSoftwareTags({ Software: '  ', Encoder: 42, CreationSoftware: null })).toEqual([]);
  });
});

describe('NullMetadataReader', () => {
  it('should report no tags', async () => {
    const reader = new NullMetadataReader();
    await expect(reader.readSoftwareTags('/photos/a.jpg')).resolves.toEqual([]);
    await expect(reader.close()).resolves.toBeUndefined();
  });
});
