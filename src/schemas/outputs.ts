/**
 * Output schemas for the audio tools.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Slim entities used across outputs
// ---------------------------------------------------------------------------

const SlimFileSchema = z.object({
  path: z.string(),
  filename: z.string(),
  folder: z.string(),
  extension: z.string(),
});
export type SlimFile = z.infer<typeof SlimFileSchema>;

const SlimCandidateSchema = z.object({
  path: z.string(),
  filename: z.string(),
  match_type: z.enum([
    'artist_title',
    'metadata',
    'filename',
    'artist_title_fuzzy',
    'metadata_fuzzy',
    'filename_fuzzy',
  ]),
  score: z.number().min(0).max(100),
  matched_text: z.string(),
  artist: z.string().nullable(),
  title: z.string().nullable(),
});
export type SlimCandidate = z.infer<typeof SlimCandidateSchema>;

// ---------------------------------------------------------------------------
// Tool outputs
// ---------------------------------------------------------------------------

export const ListAudioFilesOutput = z.object({
  ok: z.literal(true),
  _msg: z.string(),
  directory: z.string(),
  total: z.number().int().nonnegative(),
  count: z.number().int().nonnegative(),
  files: z.array(SlimFileSchema),
  nextCursor: z.string().optional(),
});
export type ListAudioFilesOutput = z.infer<typeof ListAudioFilesOutput>;

export const SearchSongsOutput = z.object({
  ok: z.literal(true),
  _msg: z.string(),
  query: z.string(),
  count: z.number().int().nonnegative(),
  results: z.array(SlimCandidateSchema),
  playlist_replaced: z.boolean(),
});
export type SearchSongsOutput = z.infer<typeof SearchSongsOutput>;

export const PlaybackStatusOutput = z.object({
  ok: z.literal(true),
  _msg: z.string(),
  state: z.enum(['stopped', 'playing', 'paused']),
  current_file: z.string().nullable(),
  volume: z.number().int().min(0).max(10),
  playlist_size: z.number().int().nonnegative(),
  current_index: z.number().int(),
  position_seconds: z.number(),
  duration_seconds: z.number().nullable(),
  stale: z.boolean(),
});
export type PlaybackStatusOutput = z.infer<typeof PlaybackStatusOutput>;

export const HealthOutput = z.object({
  ok: z.literal(true),
  _msg: z.string(),
  status: z.string(),
  timestamp: z.number(),
  runtime: z.string(),
  uptime: z.number().optional(),
  nodeVersion: z.string().optional(),
  memoryUsage: z.number().optional(),
});
export type HealthOutput = z.infer<typeof HealthOutput>;
