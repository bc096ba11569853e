/**
 * Tool registration for the audio MCP server.
 */

import { randomUUID } from 'node:crypto';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AudioServices } from '../core/services.js';
import { executeSharedTool, sharedTools, type ToolContext } from '../shared/tools/registry.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Register all tools with the MCP server.
 * Handlers run through `executeSharedTool` so failures keep one shape.
 */
export function registerTools(server: McpServer, services: AudioServices): void {
  const registeredNames: string[] = [];

  for (const tool of sharedTools) {
    try {
      server.registerTool(
        tool.name,
        {
          title: tool.title,
          description: tool.description,
          inputSchema: tool.inputShape,
          ...(tool.outputSchema && { outputSchema: tool.outputSchema }),
          ...(tool.annotations && { annotations: tool.annotations }),
        },
        async (args, extra) => {
          const context: ToolContext = {
            sessionId: extra.sessionId ?? randomUUID(),
            signal: extra.signal,
            meta: {
              progressToken: extra._meta?.progressToken,
              requestId: String(extra.requestId),
            },
            services,
          };
          return executeSharedTool(tool.name, args, context);
        },
      );

      registeredNames.push(tool.name);
      void logger.debug('tools', { message: 'Registered tool', toolName: tool.name });
    } catch (error) {
      void logger.error('tools', {
        message: 'Failed to register tool',
        toolName: tool.name,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  void logger.info('tools', {
    message: `Registered ${registeredNames.length} tools`,
    toolNames: registeredNames,
  });
}
