#!/usr/bin/env node
import { serve } from '@hono/node-server';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config } from './config/env.js';
import { buildServer } from './core/mcp.js';
import { type AudioServices, createAudioServices } from './core/services.js';
import { buildHttpApp } from './http/app.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function startHttp(services: AudioServices): Promise<void> {
  const { app } = buildHttpApp(services);
  serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST });
  await logger.info('server', {
    message: `MCP server started on http://${config.HOST}:${config.PORT}/mcp`,
    environment: config.NODE_ENV,
    musicDirectory: services.library.rootDir,
  });
}

async function startStdio(services: AudioServices): Promise<void> {
  const server = buildServer({ services });
  await server.connect(new StdioServerTransport());
  await logger.info('server', {
    message: 'MCP server listening on stdio',
    musicDirectory: services.library.rootDir,
  });
}

async function main(): Promise<void> {
  logger.setLevel(config.LOG_LEVEL);
  const services = createAudioServices(config);

  const shutdown = (signal: string) => {
    void logger.info('server', { message: `Received ${signal}, shutting down` });
    services.controller.dispose().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Failed to release the media player:', error);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    if (config.MCP_TRANSPORT === 'stdio') {
      await startStdio(services);
    } else {
      await startHttp(services);
    }
  } catch (error) {
    console.error('Failed to start server:', error);
    await logger.error('server', {
      message: 'Server startup failed',
      error: errorMessage(error),
    });
    process.exit(1);
  }
}

void main();
