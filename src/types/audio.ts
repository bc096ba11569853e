/**
 * Domain types shared by the library, search and playback services.
 */

export interface AudioFile {
  /** Absolute path; unique key of the file. */
  path: string;
  /** Path relative to the library root, always with `/` separators. */
  relativePath: string;
  filename: string;
  /** Filename without its extension. */
  stem: string;
  /** Lowercase extension including the dot, e.g. `.mp3`. */
  extension: string;
  size?: number;
  /** Relative folder of the file, `root` for files directly in the library root. */
  directory: string;
}

export interface TrackMetadata {
  artist: string | null;
  title: string | null;
  genre: string | null;
  /** Seconds. */
  duration: number | null;
}

export type MetadataResult =
  | { ok: true; metadata: TrackMetadata }
  | { ok: false; metadata: TrackMetadata; reason: string };

export const EXACT_MATCH_TYPES = ['artist_title', 'metadata', 'filename'] as const;

export type ExactMatchType = (typeof EXACT_MATCH_TYPES)[number];
export type MatchType = ExactMatchType | `${ExactMatchType}_fuzzy`;

export interface SearchCandidate {
  file: AudioFile;
  metadata: TrackMetadata;
  matchType: MatchType;
  /** Rank in [0, 100], one decimal. */
  score: number;
  /** Normalized comparison string that produced the score. */
  matchedText: string;
}

export type PlaybackState = 'stopped' | 'playing' | 'paused';

export interface PlaybackStatus {
  state: PlaybackState;
  currentFile: string | null;
  volume: number;
  playlistSize: number;
  currentIndex: number;
  positionSeconds: number;
  durationSeconds: number | null;
  /** True when the engine could not be queried and cached values are reported. */
  stale: boolean;
}
