/**
 * Shared tool registry for the audio MCP server.
 */

import {
  listAudioFilesTool,
  listFoldersTool,
  listGenresTool,
  rescanLibraryTool,
  searchByGenreTool,
} from './audio-library.js';
import {
  nextSongTool,
  pausePlaybackTool,
  playAudioTool,
  previousSongTool,
  resumePlaybackTool,
  seekToPositionTool,
  setVolumeTool,
  skipBackwardTool,
  skipForwardTool,
  stopPlaybackTool,
} from './audio-playback.js';
import {
  playRandomByArtistTool,
  playRandomFromGenreTool,
  searchAndPlayTool,
  searchSongsTool,
} from './audio-search.js';
import { diagnoseTool } from './diagnose.js';
import { healthTool } from './health.js';
import { playbackStatusTool } from './playback-status.js';
import { failureResult } from './result.js';
import type { RegisteredTool, ToolContext, ToolResult } from './types.js';

// Re-export types for convenience
export type { RegisteredTool, SharedToolDefinition, ToolContext, ToolResult } from './types.js';
export { defineTool } from './types.js';

export const sharedTools: RegisteredTool[] = [
  listAudioFilesTool,
  listFoldersTool,
  listGenresTool,
  searchByGenreTool,
  rescanLibraryTool,
  playAudioTool,
  stopPlaybackTool,
  pausePlaybackTool,
  resumePlaybackTool,
  nextSongTool,
  previousSongTool,
  skipForwardTool,
  skipBackwardTool,
  seekToPositionTool,
  setVolumeTool,
  playbackStatusTool,
  searchSongsTool,
  searchAndPlayTool,
  playRandomByArtistTool,
  playRandomFromGenreTool,
  diagnoseTool,
  healthTool,
];

export function getSharedTool(name: string): RegisteredTool | undefined {
  return sharedTools.find((t) => t.name === name);
}

export function getSharedToolNames(): string[] {
  return sharedTools.map((t) => t.name);
}

/**
 * Execute a shared tool by name.
 * Handles input validation, output validation, and error wrapping.
 */
export async function executeSharedTool(
  name: string,
  args: unknown,
  context: ToolContext,
): Promise<ToolResult> {
  const tool = getSharedTool(name);
  if (!tool) {
    return failureResult({ ok: false, kind: 'InvalidInput', error: `Unknown tool: ${name}` });
  }

  if (context.signal?.aborted) {
    return failureResult({ ok: false, kind: 'Internal', error: 'Operation was cancelled' });
  }

  const parsed = tool.parse(args);
  if (!parsed.success) {
    return failureResult({
      ok: false,
      kind: 'InvalidInput',
      error: `Invalid input: ${parsed.issues.join(', ')}`,
    });
  }

  try {
    const result = await parsed.run(context);

    if (tool.outputSchema && !result.isError && !result.structuredContent) {
      return failureResult({
        ok: false,
        kind: 'Internal',
        error: 'Tool with outputSchema must return structuredContent (unless isError is true)',
      });
    }

    return result;
  } catch (error) {
    if (context.signal?.aborted) {
      return failureResult({ ok: false, kind: 'Internal', error: 'Operation was cancelled' });
    }
    return failureResult({
      ok: false,
      kind: 'Internal',
      error: `Tool error: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}
