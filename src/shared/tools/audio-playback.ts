/**
 * Playback tools - drive the PlaybackController.
 */

import { toolsMetadata } from '../../config/metadata.js';
import {
  EmptyInputSchema,
  PlayAudioInputSchema,
  SeekInputSchema,
  SetVolumeInputSchema,
  SkipBackwardInputSchema,
  SkipForwardInputSchema,
} from '../../schemas/inputs.js';
import type { TransitionResult } from '../../services/player/controller.js';
import { toPlayback, toSeek } from '../../utils/mappers.js';
import { errorResult, ok } from './result.js';
import { defineTool, type ToolResult } from './types.js';

const controlAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  openWorldHint: false,
} as const;

function transition(result: TransitionResult, changedMsg: string, unchangedMsg: string): ToolResult {
  return ok(result.changed ? changedMsg : unchangedMsg, {
    state: result.state,
    changed: result.changed,
    file: result.file?.relativePath ?? null,
  });
}

export const playAudioTool = defineTool({
  name: toolsMetadata.play_audio.name,
  title: toolsMetadata.play_audio.title,
  description: toolsMetadata.play_audio.description,
  inputSchema: PlayAudioInputSchema,
  annotations: { title: toolsMetadata.play_audio.title, ...controlAnnotations },

  handler: async (args, { services }) => {
    try {
      const file = await services.library.resolve(args.path);
      const played = await services.controller.play(file);
      return ok(`Now playing: ${file.relativePath}`, toPlayback(played));
    } catch (error) {
      return errorResult('play_audio', error);
    }
  },
});

export const stopPlaybackTool = defineTool({
  name: toolsMetadata.stop_playback.name,
  title: toolsMetadata.stop_playback.title,
  description: toolsMetadata.stop_playback.description,
  inputSchema: EmptyInputSchema,
  annotations: { title: toolsMetadata.stop_playback.title, ...controlAnnotations, idempotentHint: true },

  handler: async (_args, { services }) => {
    try {
      const result = await services.controller.stop();
      return transition(result, 'Playback stopped', 'Nothing was playing');
    } catch (error) {
      return errorResult('stop_playback', error);
    }
  },
});

export const pausePlaybackTool = defineTool({
  name: toolsMetadata.pause_playback.name,
  title: toolsMetadata.pause_playback.title,
  description: toolsMetadata.pause_playback.description,
  inputSchema: EmptyInputSchema,
  annotations: { title: toolsMetadata.pause_playback.title, ...controlAnnotations, idempotentHint: true },

  handler: async (_args, { services }) => {
    try {
      const result = await services.controller.pause();
      return transition(result, 'Playback paused', 'Playback was already paused');
    } catch (error) {
      return errorResult('pause_playback', error);
    }
  },
});

export const resumePlaybackTool = defineTool({
  name: toolsMetadata.resume_playback.name,
  title: toolsMetadata.resume_playback.title,
  description: toolsMetadata.resume_playback.description,
  inputSchema: EmptyInputSchema,
  annotations: { title: toolsMetadata.resume_playback.title, ...controlAnnotations, idempotentHint: true },

  handler: async (_args, { services }) => {
    try {
      const result = await services.controller.resume();
      return transition(result, 'Playback resumed', 'Playback was already running');
    } catch (error) {
      return errorResult('resume_playback', error);
    }
  },
});

export const nextSongTool = defineTool({
  name: toolsMetadata.next_song.name,
  title: toolsMetadata.next_song.title,
  description: toolsMetadata.next_song.description,
  inputSchema: EmptyInputSchema,
  annotations: { title: toolsMetadata.next_song.title, ...controlAnnotations },

  handler: async (_args, { services }) => {
    try {
      const played = await services.controller.next();
      return ok(
        `Now playing: ${played.file.relativePath} (${played.index + 1}/${played.playlistSize})`,
        toPlayback(played),
      );
    } catch (error) {
      return errorResult('next_song', error);
    }
  },
});

export const previousSongTool = defineTool({
  name: toolsMetadata.previous_song.name,
  title: toolsMetadata.previous_song.title,
  description: toolsMetadata.previous_song.description,
  inputSchema: EmptyInputSchema,
  annotations: { title: toolsMetadata.previous_song.title, ...controlAnnotations },

  handler: async (_args, { services }) => {
    try {
      const played = await services.controller.previous();
      return ok(
        `Now playing: ${played.file.relativePath} (${played.index + 1}/${played.playlistSize})`,
        toPlayback(played),
      );
    } catch (error) {
      return errorResult('previous_song', error);
    }
  },
});

export const skipForwardTool = defineTool({
  name: toolsMetadata.skip_forward.name,
  title: toolsMetadata.skip_forward.title,
  description: toolsMetadata.skip_forward.description,
  inputSchema: SkipForwardInputSchema,
  annotations: { title: toolsMetadata.skip_forward.title, ...controlAnnotations },

  handler: async (args, { services }) => {
    try {
      const result = await services.controller.skipForward(args.seconds);
      return ok(`Skipped forward to ${toSeek(result).position_seconds}s`, toSeek(result));
    } catch (error) {
      return errorResult('skip_forward', error);
    }
  },
});

export const skipBackwardTool = defineTool({
  name: toolsMetadata.skip_backward.name,
  title: toolsMetadata.skip_backward.title,
  description: toolsMetadata.skip_backward.description,
  inputSchema: SkipBackwardInputSchema,
  annotations: { title: toolsMetadata.skip_backward.title, ...controlAnnotations },

  handler: async (args, { services }) => {
    try {
      const result = await services.controller.skipBackward(args.seconds);
      return ok(`Skipped back to ${toSeek(result).position_seconds}s`, toSeek(result));
    } catch (error) {
      return errorResult('skip_backward', error);
    }
  },
});

export const seekToPositionTool = defineTool({
  name: toolsMetadata.seek_to_position.name,
  title: toolsMetadata.seek_to_position.title,
  description: toolsMetadata.seek_to_position.description,
  inputSchema: SeekInputSchema,
  annotations: { title: toolsMetadata.seek_to_position.title, ...controlAnnotations, idempotentHint: true },

  handler: async (args, { services }) => {
    try {
      const result = await services.controller.seek(args.position_seconds);
      const seek = toSeek(result);
      return ok(
        result.clamped
          ? `Requested ${args.position_seconds}s, moved to ${seek.position_seconds}s`
          : `Moved to ${seek.position_seconds}s`,
        seek,
      );
    } catch (error) {
      return errorResult('seek_to_position', error);
    }
  },
});

export const setVolumeTool = defineTool({
  name: toolsMetadata.set_volume.name,
  title: toolsMetadata.set_volume.title,
  description: toolsMetadata.set_volume.description,
  inputSchema: SetVolumeInputSchema,
  annotations: { title: toolsMetadata.set_volume.title, ...controlAnnotations, idempotentHint: true },

  handler: async (args, { services }) => {
    try {
      const result = await services.controller.setVolume(args.level);
      return ok(`Volume set to ${result.volume}/10`, {
        volume: result.volume,
        requested: result.requested,
        clamped: result.clamped,
      });
    } catch (error) {
      return errorResult('set_volume', error);
    }
  },
});
