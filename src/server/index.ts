/**
 * HTTP Server
 * REST API over the knowledge service
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { serve } from '@hono/node-server';

import type { KnowledgeService } from '../services/knowledge-service.js';
import { createApiRouter } from './api/index.js';
import { handleError } from './api/utils.js';

export interface ServerOptions {
  host?: string;
  port?: number;
  /** Request logging; off in tests */
  logRequests?: boolean;
}

export function createApp(service: KnowledgeService, options: Pick<ServerOptions, 'logRequests'> = {}): Hono {
  const app = new Hono();

  // Middleware
  app.use('/*', cors());
  if (options.logRequests !== false) {
    app.use('/*', logger());
  }

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  // API routes, under /api and at the root (POST /classify, GET /digest, ...)
  const api = createApiRouter(service);
  app.route('/api', api);
  app.route('/', api);

  app.notFound((c) => c.json({ error: { code: 'NOT_FOUND', message: `No route for ${c.req.method} ${c.req.path}`, retryable: false } }, 404));
  app.onError(handleError);

  return app;
}

export type ServerInstance = ReturnType<typeof serve>;

let serverInstance: ServerInstance | null = null;

/**
 * Start the HTTP server
 */
export function startServer(service: KnowledgeService, options: ServerOptions = {}): ServerInstance {
  if (serverInstance) {
    return serverInstance;
  }

  const hostname = options.host ?? '127.0.0.1';
  const port = options.port ?? 37888;
  const app = createApp(service, options);

  serverInstance = serve({ fetch: app.fetch, hostname, port });
  console.log(`[Server] knowledge router listening at http://${hostname}:${port}`);

  return serverInstance;
}

/**
 * Stop the HTTP server
 */
export function stopServer(): Promise<void> {
  const instance = serverInstance;
  serverInstance = null;
  if (!instance) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    instance.close((error) => (error ? reject(error) : resolve()));
  });
}
