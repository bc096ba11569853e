// MCP server entry point for Streamable HTTP (Node.js/Hono)

import type { HttpBindings } from '@hono/node-server';
import { Hono } from 'hono';
import { buildServer } from '../core/mcp.js';
import type { AudioServices } from '../core/services.js';
import { corsMiddleware } from './middlewares/cors.js';
import { createMcpSecurityMiddleware } from './middlewares/mcp-security.js';
import { healthRoutes } from './routes/health.js';
import { buildMcpRoutes, type McpSession } from './routes/mcp.js';

export interface HttpApp {
  app: Hono<{ Bindings: HttpBindings }>;
  sessions: Map<string, McpSession>;
}

export function buildHttpApp(services: AudioServices): HttpApp {
  const app = new Hono<{ Bindings: HttpBindings }>();
  const sessions = new Map<string, McpSession>();

  // Global middleware
  app.use('*', corsMiddleware());

  // Routes
  app.route('/', healthRoutes(services));

  // MCP endpoint with security
  app.use('/mcp', createMcpSecurityMiddleware(services.config.MCP_PROTOCOL_VERSION));
  app.route(
    '/mcp',
    buildMcpRoutes({ createServer: () => buildServer({ services }), sessions }),
  );

  return { app, sessions };
}
