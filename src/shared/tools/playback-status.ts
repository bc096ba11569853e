/**
 * Playback Status Tool - current state, file, position and volume.
 */

import { toolsMetadata } from '../../config/metadata.js';
import { EmptyInputSchema } from '../../schemas/inputs.js';
import { PlaybackStatusOutput } from '../../schemas/outputs.js';
import { toStatus } from '../../utils/mappers.js';
import { ok } from './result.js';
import { defineTool } from './types.js';

export const playbackStatusTool = defineTool({
  name: toolsMetadata.get_playback_status.name,
  title: toolsMetadata.get_playback_status.title,
  description: toolsMetadata.get_playback_status.description,
  inputSchema: EmptyInputSchema,
  outputSchema: PlaybackStatusOutput.shape,
  annotations: {
    title: toolsMetadata.get_playback_status.title,
    readOnlyHint: true,
    openWorldHint: false,
  },

  // status() never rejects
  handler: async (_args, { services }) => {
    const status = toStatus(await services.controller.status());
    let msg: string;
    if (status.state === 'stopped') {
      msg = 'Nothing is playing';
    } else {
      const position = `${status.position_seconds}s${status.duration_seconds === null ? '' : ` of ${status.duration_seconds}s`}`;
      msg = `${status.state === 'paused' ? 'Paused' : 'Playing'}: ${status.current_file ?? 'unknown'} at ${position}`;
    }
    if (status.stale) {
      msg += ' (player not responding, position may be outdated)';
    }
    return ok(msg, status);
  },
});
