import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import type { MusicLibrary } from '../services/library/library.js';
import { toSlimFile } from '../utils/mappers.js';

export const filesResource = {
  uri: 'audio://files',
  name: 'Audio Library',
  description: 'Every audio file found in the music directory',
  mimeType: 'application/json',

  handler: async (library: MusicLibrary): Promise<ReadResourceResult> => {
    const files = await library.files();
    return {
      contents: [
        {
          uri: 'audio://files',
          name: 'audio-files.json',
          mimeType: 'application/json',
          text: JSON.stringify(
            { directory: library.rootDir, total: files.length, files: files.map(toSlimFile) },
            null,
            2,
          ),
        },
      ],
    };
  },
} as const;
