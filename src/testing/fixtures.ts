import * as path from 'node:path';
import type { RawTags } from '../services/library/metadata.js';
import { toAudioFile } from '../services/library/scanner.js';
import type { AudioFile, TrackMetadata } from '../types/audio.js';

export const MUSIC_ROOT = path.resolve('/music');

export interface FixtureTrack {
  relativePath: string;
  artist: string | null;
  title: string | null;
  genre: string | null;
}

/** Small library used across search, autoplay and tool tests. */
export const FIXTURE_TRACKS: readonly FixtureTrack[] = [
  { relativePath: 'Pop/Ed Sheeran - Shape of You.mp3', artist: 'Ed Sheeran', title: 'Shape of You', genre: 'Pop' },
  { relativePath: 'Pop/Ed Sheeran - Perfect.mp3', artist: 'Ed Sheeran', title: 'Perfect', genre: 'Pop' },
  { relativePath: 'Rock/Queen - Bohemian Rhapsody.flac', artist: 'Queen', title: 'Bohemian Rhapsody', genre: 'Rock' },
  { relativePath: 'Rock/Queen - Under Pressure.flac', artist: 'Queen', title: 'Under Pressure', genre: 'Rock' },
  { relativePath: 'untagged/shape_of_my_heart.ogg', artist: null, title: null, genre: null },
  { relativePath: 'Jazz/Take Five.mp3', artist: 'Dave Brubeck', title: 'Take Five', genre: 'Jazz' },
];

export function fixtureFile(relativePath: string, root: string = MUSIC_ROOT): AudioFile {
  return toAudioFile(root, path.join(root, ...relativePath.split('/')));
}

export function fixtureFiles(root: string = MUSIC_ROOT): AudioFile[] {
  return FIXTURE_TRACKS.map((track) => fixtureFile(track.relativePath, root));
}

export function fixtureMetadata(file: AudioFile): TrackMetadata {
  const track = FIXTURE_TRACKS.find((t) => t.relativePath === file.relativePath);
  return {
    artist: track?.artist ?? null,
    title: track?.title ?? null,
    genre: track?.genre ?? null,
    duration: track ? 200 : null,
  };
}

/** Tag reader over FIXTURE_TRACKS keyed by the file's relative path under any root. */
export function fixtureTagReader(root: string) {
  return async (filePath: string): Promise<RawTags> => {
    const relativePath = path.relative(root, filePath).split(path.sep).join('/');
    const track = FIXTURE_TRACKS.find((t) => t.relativePath === relativePath);
    if (!track) {
      throw new Error(`No tags in ${relativePath}`);
    }
    return {
      common: {
        artist: track.artist ?? undefined,
        title: track.title ?? undefined,
        genre: track.genre ? [track.genre] : undefined,
      },
      native: {},
      duration: 200,
    };
  };
}
