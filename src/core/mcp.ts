import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { serverMetadata } from '../config/metadata.js';
import { registerResources } from '../resources/index.js';
import { registerTools } from '../tools/index.js';
import { logger } from '../utils/logger.js';
import { buildCapabilities } from './capabilities.js';
import type { AudioServices } from './services.js';

export interface ServerOptions {
  services: AudioServices;
  name?: string;
  version?: string;
  instructions?: string;
  /** Called once the client sent `notifications/initialized`. */
  oninitialized?: () => void;
}

/**
 * Build one MCP server. HTTP sessions each get their own server, all
 * sharing the same services.
 */
export function buildServer(options: ServerOptions): McpServer {
  const { services, oninitialized } = options;
  const { config } = services;

  const server = new McpServer(
    {
      name: options.name ?? config.MCP_TITLE,
      version: options.version ?? config.MCP_VERSION,
    },
    {
      capabilities: buildCapabilities(),
      instructions: options.instructions ?? config.MCP_INSTRUCTIONS ?? serverMetadata.instructions,
    },
  );

  const detach = logger.attachServer(server);
  const previousOnClose = server.server.onclose;
  server.server.onclose = () => {
    detach();
    previousOnClose?.();
  };

  server.server.oninitialized = () => {
    void logger.info('mcp', {
      message: 'Client initialization complete',
      clientVersion: server.server.getClientVersion(),
    });
    oninitialized?.();
  };

  registerTools(server, services);
  registerResources(server, services);

  // Required when the logging capability is advertised
  server.server.setRequestHandler(SetLevelRequestSchema, async (request) => {
    const level = request.params.level;
    logger.setLevel(level);
    void logger.info('mcp', { message: 'Log level changed', level, effective: logger.getLevel() });
    return {};
  });

  return server;
}
