export type AudioErrorKind =
  | 'DirectoryNotFound'
  | 'FileNotFound'
  | 'PathTraversalRejected'
  | 'NoConfidentMatch'
  | 'NoMatch'
  | 'NotPlaying'
  | 'NothingToResume'
  | 'EndOfPlaylist'
  | 'StartOfPlaylist'
  | 'EmptyPlaylist'
  | 'SeekUnsupported'
  | 'EngineUnavailable';

/** Kinds reported across the tool boundary, including ones with no AudioError. */
export type FailureKind = AudioErrorKind | 'InvalidInput' | 'Internal';

export class AudioError extends Error {
  readonly kind: AudioErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: AudioErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AudioError';
    this.kind = kind;
    this.details = details;
  }
}

export function isAudioError(error: unknown): error is AudioError {
  return error instanceof AudioError;
}

export type Failure = {
  ok: false;
  kind: FailureKind;
  error: string;
  details?: Record<string, unknown>;
};

export function toFailure(error: unknown): Failure {
  if (isAudioError(error)) {
    return {
      ok: false,
      kind: error.kind,
      error: error.message,
      ...(error.details ? { details: error.details } : {}),
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { ok: false, kind: 'Internal', error: message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
