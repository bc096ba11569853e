/**
 * Contract between the playback controller and whatever actually decodes
 * and outputs audio.
 */

export interface PlaybackHandle {
  pause(): Promise<void>;
  resume(): Promise<void>;
  /** Absolute position in seconds. */
  seek(seconds: number): Promise<void>;
  /** Engine-native volume, 0-100. */
  setVolume(percent: number): Promise<void>;
  position(): Promise<number>;
  /** Seconds, or null when the engine does not know yet. */
  duration(): Promise<number | null>;
  seekable(): Promise<boolean>;
  /** True once the track played to its end or the engine went away. */
  readonly ended: boolean;
  /** Stop output and free every resource the handle holds. Idempotent. */
  release(): Promise<void>;
}

export interface OpenOptions {
  /** Engine-native volume, 0-100. */
  volume: number;
}

export interface EngineDiagnostics {
  engine: string;
  available: boolean;
  version: string | null;
  binary: string;
  supportedFormats: string[];
  errors: string[];
}

export interface MediaEngine {
  open(filePath: string, options: OpenOptions): Promise<PlaybackHandle>;
  diagnose(): Promise<EngineDiagnostics>;
}
