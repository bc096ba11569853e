/**
 * Library tools - browse the scanned music directory.
 */

import { toolsMetadata } from '../../config/metadata.js';
import {
  EmptyInputSchema,
  ListAudioFilesInputSchema,
  SearchByGenreInputSchema,
} from '../../schemas/inputs.js';
import { ListAudioFilesOutput } from '../../schemas/outputs.js';
import { toFolder, toSlimFile } from '../../utils/mappers.js';
import { paginate } from '../../utils/pagination.js';
import { logger } from '../../utils/logger.js';
import { errorResult, ok } from './result.js';
import { defineTool } from './types.js';

export const listAudioFilesTool = defineTool({
  name: toolsMetadata.list_audio_files.name,
  title: toolsMetadata.list_audio_files.title,
  description: toolsMetadata.list_audio_files.description,
  inputSchema: ListAudioFilesInputSchema,
  outputSchema: ListAudioFilesOutput.shape,
  annotations: {
    title: toolsMetadata.list_audio_files.title,
    readOnlyHint: true,
    openWorldHint: false,
  },

  handler: async (args, { services }) => {
    try {
      const { library } = services;
      const files = args.refresh ? await library.refresh() : await library.files();
      if (args.refresh) {
        await services.controller.replacePlaylist(files);
      }
      const page = paginate(files, args.cursor, args.limit);
      const shown = page.items.length;
      const msg =
        files.length === 0
          ? `No audio files found in ${library.rootDir}`
          : `Showing ${shown} of ${files.length} audio files${page.nextCursor ? '; pass nextCursor for more' : ''}`;
      return ok(msg, {
        directory: library.rootDir,
        total: files.length,
        count: shown,
        files: page.items.map(toSlimFile),
        ...(page.nextCursor ? { nextCursor: page.nextCursor } : {}),
      });
    } catch (error) {
      return errorResult('list_audio_files', error);
    }
  },
});

export const listFoldersTool = defineTool({
  name: toolsMetadata.list_folders.name,
  title: toolsMetadata.list_folders.title,
  description: toolsMetadata.list_folders.description,
  inputSchema: EmptyInputSchema,
  annotations: {
    title: toolsMetadata.list_folders.title,
    readOnlyHint: true,
    openWorldHint: false,
  },

  handler: async (_args, { services }) => {
    try {
      const folders = await services.library.folders();
      return ok(`Found ${folders.length} folders with audio files`, {
        count: folders.length,
        folders: folders.map(toFolder),
      });
    } catch (error) {
      return errorResult('list_folders', error);
    }
  },
});

export const listGenresTool = defineTool({
  name: toolsMetadata.list_genres.name,
  title: toolsMetadata.list_genres.title,
  description: toolsMetadata.list_genres.description,
  inputSchema: EmptyInputSchema,
  annotations: {
    title: toolsMetadata.list_genres.title,
    readOnlyHint: true,
    openWorldHint: false,
  },

  handler: async (_args, { services }) => {
    try {
      const genres = await services.library.genres();
      return ok(`Found ${genres.length} genres`, { count: genres.length, genres });
    } catch (error) {
      return errorResult('list_genres', error);
    }
  },
});

export const searchByGenreTool = defineTool({
  name: toolsMetadata.search_by_genre.name,
  title: toolsMetadata.search_by_genre.title,
  description: toolsMetadata.search_by_genre.description,
  inputSchema: SearchByGenreInputSchema,
  annotations: {
    title: toolsMetadata.search_by_genre.title,
    readOnlyHint: true,
    openWorldHint: false,
  },

  handler: async (args, { services }) => {
    try {
      const matches = await services.library.findByGenre(args.genre, args.limit);
      return ok(`Found ${matches.length} songs in genre '${args.genre}'`, {
        genre: args.genre,
        count: matches.length,
        files: matches.map((match) => ({ ...toSlimFile(match.file), genre: match.genre })),
      });
    } catch (error) {
      return errorResult('search_by_genre', error);
    }
  },
});

export const rescanLibraryTool = defineTool({
  name: toolsMetadata.rescan_library.name,
  title: toolsMetadata.rescan_library.title,
  description: toolsMetadata.rescan_library.description,
  inputSchema: EmptyInputSchema,
  annotations: {
    title: toolsMetadata.rescan_library.title,
    readOnlyHint: false,
    idempotentHint: true,
    openWorldHint: false,
  },

  handler: async (_args, { services, sessionId }) => {
    try {
      const files = await services.library.refresh();
      await services.controller.replacePlaylist(files);
      void logger.info('rescan_library', {
        message: `Library re-scanned: ${files.length} files`,
        sessionId,
      });
      return ok(`Re-scanned ${services.library.rootDir}: ${files.length} audio files`, {
        directory: services.library.rootDir,
        total: files.length,
      });
    } catch (error) {
      return errorResult('rescan_library', error);
    }
  },
});
