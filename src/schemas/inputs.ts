import { z } from 'zod';

export const EmptyInputSchema = z.object({}).strict();

// Library
export const ListAudioFilesInputSchema = z.object({
  refresh: z
    .boolean()
    .optional()
    .describe('Re-scan the music directory before listing.'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(500)
    .default(100)
    .describe('Maximum number of files per page (1-500).'),
  cursor: z
    .string()
    .optional()
    .describe("Opaque cursor from a previous call's nextCursor."),
});
export type ListAudioFilesInput = z.infer<typeof ListAudioFilesInputSchema>;

export const SearchByGenreInputSchema = z.object({
  genre: z
    .string()
    .trim()
    .min(1)
    .describe("Genre name or fragment, matched case-insensitively (e.g. 'rock')."),
  limit: z
    .number()
    .int()
    .min(1)
    .max(500)
    .default(20)
    .describe('Maximum number of songs to return.'),
});
export type SearchByGenreInput = z.infer<typeof SearchByGenreInputSchema>;

// Playback
export const PlayAudioInputSchema = z.object({
  path: z
    .string()
    .trim()
    .min(1)
    .describe(
      "Path relative to the music directory (e.g. 'Rock/song.mp3') or a bare filename anywhere in the library.",
    ),
});
export type PlayAudioInput = z.infer<typeof PlayAudioInputSchema>;

export const SkipForwardInputSchema = z.object({
  seconds: z
    .number()
    .positive()
    .default(30)
    .describe('Seconds to jump ahead.'),
});
export type SkipForwardInput = z.infer<typeof SkipForwardInputSchema>;

export const SkipBackwardInputSchema = z.object({
  seconds: z
    .number()
    .positive()
    .default(10)
    .describe('Seconds to jump back.'),
});
export type SkipBackwardInput = z.infer<typeof SkipBackwardInputSchema>;

export const SeekInputSchema = z.object({
  position_seconds: z
    .number()
    .describe('Target position in seconds; clamped to the length of the track.'),
});
export type SeekInput = z.infer<typeof SeekInputSchema>;

export const SetVolumeInputSchema = z.object({
  level: z
    .number()
    .describe('Volume from 0 (mute) to 10 (max). Values are rounded and clamped.'),
});
export type SetVolumeInput = z.infer<typeof SetVolumeInputSchema>;

// Search
export const SearchSongsInputSchema = z.object({
  query: z
    .string()
    .describe("Free text: title, artist, 'artist - title' or part of a filename."),
  limit: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(5)
    .describe('Maximum number of results (1-100).'),
  as_playlist: z
    .boolean()
    .optional()
    .describe('Replace the current playlist with the results so next/previous walk them.'),
});
export type SearchSongsInput = z.infer<typeof SearchSongsInputSchema>;

export const SearchAndPlayInputSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1)
    .describe('Song to find and play when the best match is confident enough.'),
});
export type SearchAndPlayInput = z.infer<typeof SearchAndPlayInputSchema>;

export const PlayRandomByArtistInputSchema = z.object({
  artist: z.string().trim().min(1).describe('Artist name; typos are tolerated.'),
});
export type PlayRandomByArtistInput = z.infer<typeof PlayRandomByArtistInputSchema>;

export const PlayRandomFromGenreInputSchema = z.object({
  genre: z.string().trim().min(1).describe('Genre name or fragment.'),
});
export type PlayRandomFromGenreInput = z.infer<typeof PlayRandomFromGenreInputSchema>;

// Health
export const HealthInputSchema = z.object({
  verbose: z.boolean().optional().describe('Include additional runtime details'),
});
export type HealthInput = z.infer<typeof HealthInputSchema>;
