import type { HttpBindings } from '@hono/node-server';
import { Hono } from 'hono';
import type { AudioServices } from '../../core/services.js';

export function healthRoutes(services: AudioServices) {
  const app = new Hono<{ Bindings: HttpBindings }>();

  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      timestamp: Date.now(),
      uptime: Math.floor((Date.now() - services.startedAt) / 1000),
      directory: services.library.rootDir,
    }),
  );

  return app;
}
