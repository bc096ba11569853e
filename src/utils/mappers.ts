/**
 * Mapper utilities to convert library and player objects to the slim,
 * snake_case shapes returned by tools.
 */

import type { FolderSummary } from '../services/library/library.js';
import type { PlayResult, SeekResult } from '../services/player/controller.js';
import type { AudioFile, PlaybackStatus, SearchCandidate } from '../types/audio.js';

export function toSlimFile(file: AudioFile) {
  return {
    path: file.relativePath,
    filename: file.filename,
    folder: file.directory,
    extension: file.extension.slice(1),
  };
}

export function toSlimCandidate(candidate: SearchCandidate) {
  return {
    path: candidate.file.relativePath,
    filename: candidate.file.filename,
    match_type: candidate.matchType,
    score: candidate.score,
    matched_text: candidate.matchedText,
    artist: candidate.metadata.artist,
    title: candidate.metadata.title,
  };
}

export function toPlayback(result: PlayResult) {
  return {
    file: result.file.relativePath,
    index: result.index,
    playlist_size: result.playlistSize,
    volume: result.volume,
  };
}

export function toSeek(result: SeekResult) {
  return {
    file: result.file.relativePath,
    requested_seconds: result.requestedSeconds,
    position_seconds: roundSeconds(result.positionSeconds),
    duration_seconds: result.durationSeconds === null ? null : roundSeconds(result.durationSeconds),
    clamped: result.clamped,
  };
}

export function toStatus(status: PlaybackStatus) {
  return {
    state: status.state,
    current_file: status.currentFile,
    volume: status.volume,
    playlist_size: status.playlistSize,
    current_index: status.currentIndex,
    position_seconds: roundSeconds(status.positionSeconds),
    duration_seconds: status.durationSeconds === null ? null : roundSeconds(status.durationSeconds),
    stale: status.stale,
  };
}

export function toFolder(summary: FolderSummary) {
  return {
    folder: summary.folder,
    file_count: summary.fileCount,
    sample_files: summary.sampleFiles,
  };
}

function roundSeconds(seconds: number): number {
  return Math.round(seconds * 10) / 10;
}
