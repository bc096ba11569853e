import type { AudioFile } from '../../types/audio.js';

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 10;

export function clampVolume(level: number): number {
  if (!Number.isFinite(level)) {
    return MIN_VOLUME;
  }
  return Math.min(MAX_VOLUME, Math.max(MIN_VOLUME, Math.round(level)));
}

/**
 * Process-wide playback state. Only the PlaybackController writes to it.
 *
 * Invariant: `0 <= currentIndex < playlist.length` whenever a track is
 * playing or paused; `currentIndex === -1` until something has played.
 */
export class PlaylistState {
  playlist: AudioFile[] = [];
  currentIndex = -1;
  paused = false;
  volume: number;
  /** Last position/duration read from the engine, reported when it cannot be queried. */
  lastPosition = 0;
  lastDuration: number | null = null;

  constructor(volume = 3) {
    this.volume = clampVolume(volume);
  }

  get currentFile(): AudioFile | null {
    return this.playlist[this.currentIndex] ?? null;
  }

  indexOf(file: AudioFile): number {
    return this.playlist.findIndex((entry) => entry.path === file.path);
  }
}
