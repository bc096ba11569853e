import type {
  EngineDiagnostics,
  MediaEngine,
  OpenOptions,
  PlaybackHandle,
} from '../services/player/engine.js';
import { AudioError } from '../utils/errors.js';

/** In-process stand-in for an mpv instance. */
export class FakeHandle implements PlaybackHandle {
  paused = false;
  released = false;
  ended = false;
  positionSeconds = 0;
  durationSeconds: number | null = 200;
  seekableMedia = true;
  /** Makes position/duration queries reject, as a hung player would. */
  failQueries = false;
  readonly calls: string[] = [];

  constructor(
    readonly filePath: string,
    public volume: number,
  ) {}

  async pause(): Promise<void> {
    this.calls.push('pause');
    this.paused = true;
  }

  async resume(): Promise<void> {
    this.calls.push('resume');
    this.paused = false;
  }

  async seek(seconds: number): Promise<void> {
    this.calls.push(`seek:${seconds}`);
    this.positionSeconds = seconds;
  }

  async setVolume(percent: number): Promise<void> {
    this.calls.push(`volume:${percent}`);
    this.volume = percent;
  }

  async position(): Promise<number> {
    if (this.failQueries) {
      throw new Error('player not responding');
    }
    return this.positionSeconds;
  }

  async duration(): Promise<number | null> {
    if (this.failQueries) {
      throw new Error('player not responding');
    }
    return this.durationSeconds;
  }

  async seekable(): Promise<boolean> {
    return this.seekableMedia;
  }

  async release(): Promise<void> {
    this.calls.push('release');
    this.released = true;
  }
}

export class FakeEngine implements MediaEngine {
  readonly handles: FakeHandle[] = [];
  failOpen = false;

  async open(filePath: string, options: OpenOptions): Promise<PlaybackHandle> {
    if (this.failOpen) {
      throw new AudioError('EngineUnavailable', 'Could not start fake player');
    }
    const handle = new FakeHandle(filePath, options.volume);
    this.handles.push(handle);
    return handle;
  }

  get current(): FakeHandle | undefined {
    return this.handles[this.handles.length - 1];
  }

  /** Handles opened and not yet released. */
  get live(): FakeHandle[] {
    return this.handles.filter((h) => !h.released);
  }

  async diagnose(): Promise<EngineDiagnostics> {
    return {
      engine: 'fake',
      available: true,
      version: '1.0',
      binary: 'fake-player',
      supportedFormats: ['mp3', 'flac', 'ogg'],
      errors: [],
    };
  }
}
