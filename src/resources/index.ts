import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AudioServices } from '../core/services.js';
import { configResource } from './config.resource.js';
import { filesResource } from './files.resource.js';

export function registerResources(server: McpServer, services: AudioServices): void {
  server.registerResource(
    'audio-files',
    filesResource.uri,
    {
      title: filesResource.name,
      description: filesResource.description,
      mimeType: filesResource.mimeType,
    },
    () => filesResource.handler(services.library),
  );

  server.registerResource(
    'server-config',
    configResource.uri,
    {
      title: configResource.name,
      description: configResource.description,
      mimeType: configResource.mimeType,
    },
    () => configResource.handler(services.config),
  );
}
