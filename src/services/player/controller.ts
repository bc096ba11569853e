/**
 * Playback Controller
 *
 * Stopped / Playing / Paused state machine over a single PlaybackHandle.
 * Transitions run one at a time; every transition that loads a track
 * releases the previous handle first.
 *
 * Playlist boundaries do not wrap: `next()` on the last track fails with
 * EndOfPlaylist and `previous()` on the first fails with StartOfPlaylist.
 */

import type { AudioFile, PlaybackState, PlaybackStatus } from '../../types/audio.js';
import { AudioError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { MediaEngine, PlaybackHandle } from './engine.js';
import { PlaylistState, clampVolume } from './state.js';

/** Engine volume is 0-100, ours is 0-10. */
const ENGINE_VOLUME_SCALE = 10;

export interface PlaybackControllerOptions {
  engine: MediaEngine;
  /** Source of the default playlist: the scanned library. */
  loadLibrary: () => Promise<AudioFile[]>;
  state?: PlaylistState;
}

export interface PlayResult {
  file: AudioFile;
  index: number;
  playlistSize: number;
  volume: number;
}

export interface TransitionResult {
  state: PlaybackState;
  /** False when the call was a no-op, e.g. pausing while already paused. */
  changed: boolean;
  file: AudioFile | null;
}

export interface SeekResult {
  requestedSeconds: number;
  positionSeconds: number;
  durationSeconds: number | null;
  clamped: boolean;
  file: AudioFile;
}

export interface VolumeResult {
  volume: number;
  requested: number;
  clamped: boolean;
}

export class PlaybackController {
  readonly state: PlaylistState;
  private readonly engine: MediaEngine;
  private readonly loadLibrary: () => Promise<AudioFile[]>;
  private handle: PlaybackHandle | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: PlaybackControllerOptions) {
    this.engine = options.engine;
    this.loadLibrary = options.loadLibrary;
    this.state = options.state ?? new PlaylistState();
  }

  /** Run transitions one after another; failures reach the caller through the returned promise. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  get playbackState(): PlaybackState {
    if (!this.handle || this.handle.ended) {
      return 'stopped';
    }
    return this.state.paused ? 'paused' : 'playing';
  }

  private async releaseHandle(): Promise<void> {
    const previous = this.handle;
    this.handle = null;
    this.state.paused = false;
    if (previous) {
      await previous.release();
    }
  }

  /** Drops a handle whose track already finished. */
  private async activeHandle(): Promise<PlaybackHandle | null> {
    if (this.handle?.ended) {
      void logger.debug('player', { message: 'Track finished, releasing handle' });
      await this.releaseHandle();
    }
    return this.handle;
  }

  private async requireHandle(): Promise<PlaybackHandle> {
    const handle = await this.activeHandle();
    if (!handle) {
      throw new AudioError('NotPlaying', 'No audio is currently playing');
    }
    return handle;
  }

  private async ensurePlaylist(): Promise<AudioFile[]> {
    if (this.state.playlist.length === 0) {
      this.state.playlist = await this.loadLibrary();
    }
    return this.state.playlist;
  }

  /** Playlist and index for `file`, without touching the current state. */
  private async locate(file: AudioFile): Promise<{ playlist: AudioFile[]; index: number }> {
    let playlist = this.state.playlist;
    let index = this.state.indexOf(file);
    if (index >= 0) {
      return { playlist, index };
    }
    playlist = await this.loadLibrary();
    index = playlist.findIndex((f) => f.path === file.path);
    if (index >= 0) {
      return { playlist, index };
    }
    return { playlist: [...playlist, file], index: playlist.length };
  }

  private async playUnlocked(file: AudioFile): Promise<PlayResult> {
    const { playlist, index } = await this.locate(file);
    await this.releaseHandle();

    this.handle = await this.engine.open(file.path, {
      volume: this.state.volume * ENGINE_VOLUME_SCALE,
    });
    this.state.playlist = playlist;
    this.state.currentIndex = index;
    this.state.paused = false;
    this.state.lastPosition = 0;
    this.state.lastDuration = null;

    void logger.info('player', {
      message: `Playing ${file.relativePath}`,
      index,
      volume: this.state.volume,
    });

    return {
      file,
      index,
      playlistSize: this.state.playlist.length,
      volume: this.state.volume,
    };
  }

  play(file: AudioFile): Promise<PlayResult> {
    return this.exclusive(() => this.playUnlocked(file));
  }

  pause(): Promise<TransitionResult> {
    return this.exclusive(async () => {
      const handle = await this.requireHandle();
      const file = this.state.currentFile;
      if (this.state.paused) {
        return { state: 'paused', changed: false, file };
      }
      await handle.pause();
      this.state.paused = true;
      await this.rememberPosition(handle);
      void logger.info('player', { message: 'Playback paused' });
      return { state: 'paused', changed: true, file };
    });
  }

  resume(): Promise<TransitionResult> {
    return this.exclusive(async () => {
      const handle = await this.activeHandle();
      if (!handle) {
        throw new AudioError('NothingToResume', 'Nothing is paused');
      }
      const file = this.state.currentFile;
      if (!this.state.paused) {
        return { state: 'playing', changed: false, file };
      }
      await handle.resume();
      this.state.paused = false;
      void logger.info('player', { message: 'Playback resumed' });
      return { state: 'playing', changed: true, file };
    });
  }

  stop(): Promise<TransitionResult> {
    return this.exclusive(async () => {
      const wasActive = (await this.activeHandle()) !== null;
      const file = this.state.currentFile;
      await this.releaseHandle();
      if (wasActive) {
        void logger.info('player', { message: 'Playback stopped' });
      }
      return { state: 'stopped', changed: wasActive, file };
    });
  }

  next(): Promise<PlayResult> {
    return this.exclusive(async () => {
      const playlist = await this.ensurePlaylist();
      if (playlist.length === 0) {
        throw new AudioError('EmptyPlaylist', 'The playlist is empty');
      }
      const target = playlist[this.state.currentIndex + 1];
      if (!target) {
        throw new AudioError('EndOfPlaylist', 'Already at the last song of the playlist', {
          index: this.state.currentIndex,
          playlistSize: playlist.length,
        });
      }
      return this.playUnlocked(target);
    });
  }

  previous(): Promise<PlayResult> {
    return this.exclusive(async () => {
      const playlist = await this.ensurePlaylist();
      if (playlist.length === 0) {
        throw new AudioError('EmptyPlaylist', 'The playlist is empty');
      }
      const target = this.state.currentIndex > 0 ? playlist[this.state.currentIndex - 1] : undefined;
      if (!target) {
        throw new AudioError('StartOfPlaylist', 'Already at the first song of the playlist', {
          index: this.state.currentIndex,
          playlistSize: playlist.length,
        });
      }
      return this.playUnlocked(target);
    });
  }

  private async seekUnlocked(handle: PlaybackHandle, seconds: number): Promise<SeekResult> {
    const file = this.state.currentFile;
    if (!file) {
      throw new AudioError('NotPlaying', 'No audio is currently playing');
    }
    if (!(await handle.seekable())) {
      throw new AudioError('SeekUnsupported', `Cannot seek in ${file.filename}`, {
        format: file.extension,
      });
    }
    const duration = await handle.duration();
    let target = Math.max(0, seconds);
    if (duration !== null) {
      target = Math.min(target, duration);
    }
    await handle.seek(target);
    this.state.lastPosition = target;
    this.state.lastDuration = duration;
    return {
      requestedSeconds: seconds,
      positionSeconds: target,
      durationSeconds: duration,
      clamped: target !== seconds,
      file,
    };
  }

  seek(seconds: number): Promise<SeekResult> {
    return this.exclusive(async () => this.seekUnlocked(await this.requireHandle(), seconds));
  }

  skipForward(seconds: number): Promise<SeekResult> {
    return this.exclusive(async () => {
      const handle = await this.requireHandle();
      return this.seekUnlocked(handle, (await handle.position()) + seconds);
    });
  }

  skipBackward(seconds: number): Promise<SeekResult> {
    return this.exclusive(async () => {
      const handle = await this.requireHandle();
      return this.seekUnlocked(handle, (await handle.position()) - seconds);
    });
  }

  setVolume(level: number): Promise<VolumeResult> {
    return this.exclusive(async () => {
      const volume = clampVolume(level);
      this.state.volume = volume;
      const handle = await this.activeHandle();
      if (handle) {
        try {
          await handle.setVolume(volume * ENGINE_VOLUME_SCALE);
        } catch (error) {
          // The level is stored and applied to the next track regardless
          void logger.warning('player', {
            message: 'Engine rejected volume change',
            volume,
            error: errorMessage(error),
          });
        }
      }
      void logger.info('player', { message: `Volume set to ${volume}/10` });
      return { volume, requested: level, clamped: volume !== level };
    });
  }

  /** Replace the playlist, keeping the current track if it is still present. */
  replacePlaylist(files: AudioFile[]): Promise<void> {
    return this.exclusive(async () => {
      const current = this.state.currentFile;
      this.state.playlist = files;
      const index = current ? this.state.indexOf(current) : -1;
      this.state.currentIndex = index;
      if (index === -1 && this.handle) {
        void logger.info('player', {
          message: 'Current track left the playlist, stopping playback',
          file: current?.relativePath,
        });
        await this.releaseHandle();
      }
    });
  }

  private async rememberPosition(handle: PlaybackHandle): Promise<void> {
    try {
      this.state.lastPosition = await handle.position();
      this.state.lastDuration = await handle.duration();
    } catch (error) {
      void logger.debug('player', {
        message: 'Could not read playback position',
        error: errorMessage(error),
      });
    }
  }

  /** Never throws: falls back to the last known position with `stale: true`. */
  async status(): Promise<PlaybackStatus> {
    const state = this.playbackState;
    const handle = state === 'stopped' ? null : this.handle;
    let stale = false;

    if (handle) {
      try {
        this.state.lastPosition = await handle.position();
        this.state.lastDuration = await handle.duration();
      } catch (error) {
        stale = true;
        void logger.warning('player', {
          message: 'Engine status query failed, reporting cached values',
          error: errorMessage(error),
        });
      }
    }

    return {
      state,
      currentFile: state === 'stopped' ? null : (this.state.currentFile?.relativePath ?? null),
      volume: this.state.volume,
      playlistSize: this.state.playlist.length,
      currentIndex: this.state.currentIndex,
      positionSeconds: handle ? this.state.lastPosition : 0,
      durationSeconds: handle ? this.state.lastDuration : null,
      stale,
    };
  }

  /** Release the engine on shutdown. */
  dispose(): Promise<void> {
    return this.exclusive(() => this.releaseHandle());
  }
}
