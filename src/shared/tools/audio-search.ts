/**
 * Search tools - ranked search and search-then-play.
 */

import { toolsMetadata } from '../../config/metadata.js';
import {
  PlayRandomByArtistInputSchema,
  PlayRandomFromGenreInputSchema,
  SearchAndPlayInputSchema,
  SearchSongsInputSchema,
} from '../../schemas/inputs.js';
import { SearchSongsOutput } from '../../schemas/outputs.js';
import type { AutoPlayResult } from '../../services/search/autoplay.js';
import { toPlayback, toSlimCandidate } from '../../utils/mappers.js';
import { errorResult, ok } from './result.js';
import { defineTool, type ToolResult } from './types.js';

function played(msg: string, result: AutoPlayResult): ToolResult {
  return ok(msg, {
    ...toPlayback(result),
    match: result.candidate ? toSlimCandidate(result.candidate) : null,
    pool_size: result.poolSize,
  });
}

export const searchSongsTool = defineTool({
  name: toolsMetadata.search_songs.name,
  title: toolsMetadata.search_songs.title,
  description: toolsMetadata.search_songs.description,
  inputSchema: SearchSongsInputSchema,
  outputSchema: SearchSongsOutput.shape,
  annotations: {
    title: toolsMetadata.search_songs.title,
    readOnlyHint: false,
    openWorldHint: false,
  },

  handler: async (args, { services }) => {
    try {
      const files = await services.library.files();
      const results = await services.search.search(args.query, files, { limit: args.limit });
      const asPlaylist = Boolean(args.as_playlist) && results.length > 0;
      if (asPlaylist) {
        await services.controller.replacePlaylist(results.map((r) => r.file));
      }
      const msg =
        results.length === 0
          ? `No songs found matching '${args.query}'`
          : `Found ${results.length} songs matching '${args.query}'${asPlaylist ? ' (now the playlist)' : ''}`;
      return ok(msg, {
        query: args.query,
        count: results.length,
        results: results.map(toSlimCandidate),
        playlist_replaced: asPlaylist,
      });
    } catch (error) {
      return errorResult('search_songs', error);
    }
  },
});

export const searchAndPlayTool = defineTool({
  name: toolsMetadata.search_and_play.name,
  title: toolsMetadata.search_and_play.title,
  description: toolsMetadata.search_and_play.description,
  inputSchema: SearchAndPlayInputSchema,
  annotations: {
    title: toolsMetadata.search_and_play.title,
    readOnlyHint: false,
    openWorldHint: false,
  },

  handler: async (args, { services }) => {
    try {
      const result = await services.autoplay.searchAndPlay(args.query);
      return played(
        `Now playing: ${result.file.relativePath} (score ${result.candidate?.score ?? 0})`,
        result,
      );
    } catch (error) {
      return errorResult('search_and_play', error);
    }
  },
});

export const playRandomByArtistTool = defineTool({
  name: toolsMetadata.play_random_song_by_artist.name,
  title: toolsMetadata.play_random_song_by_artist.title,
  description: toolsMetadata.play_random_song_by_artist.description,
  inputSchema: PlayRandomByArtistInputSchema,
  annotations: {
    title: toolsMetadata.play_random_song_by_artist.title,
    readOnlyHint: false,
    openWorldHint: false,
  },

  handler: async (args, { services }) => {
    try {
      const result = await services.autoplay.playRandomByArtist(args.artist);
      return played(
        `Now playing: ${result.file.relativePath} (picked from ${result.poolSize} songs)`,
        result,
      );
    } catch (error) {
      return errorResult('play_random_song_by_artist', error);
    }
  },
});

export const playRandomFromGenreTool = defineTool({
  name: toolsMetadata.play_random_from_genre.name,
  title: toolsMetadata.play_random_from_genre.title,
  description: toolsMetadata.play_random_from_genre.description,
  inputSchema: PlayRandomFromGenreInputSchema,
  annotations: {
    title: toolsMetadata.play_random_from_genre.title,
    readOnlyHint: false,
    openWorldHint: false,
  },

  handler: async (args, { services }) => {
    try {
      const result = await services.autoplay.playRandomFromGenre(args.genre);
      return played(
        `Now playing: ${result.file.relativePath} (picked from ${result.poolSize} songs)`,
        result,
      );
    } catch (error) {
      return errorResult('play_random_from_genre', error);
    }
  },
});
