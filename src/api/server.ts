import { Hono } from 'hono';
import { bearerAuth } from 'hono/bearer-auth';
import { HTTPException } from 'hono/http-exception';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Config } from '../shared/config.js';
import { RingfeedError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Orchestrator } from '../engine/orchestrator.js';
import type { RetryQueue } from '../queue/retryQueue.js';
import type { SourceStateRegistry } from '../resilience/registry.js';
import { systemRoutes } from './routes/system.js';
import { queueRoutes } from './routes/queue.js';

export interface AppContext {
  config: Config;
  orchestrator: Orchestrator;
  queue: RetryQueue;
  registry: SourceStateRegistry;
  now: () => number;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  const token = ctx.config.server.token;
  if (token) {
    const auth = bearerAuth({ token });
    // Liveness stays open to process supervisors.
    app.use('/api/*', (c, next) => (c.req.path === '/api/health' ? next() : auth(c, next)));
  }

  app.route('/api', systemRoutes(ctx));
  app.route('/api', queueRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof RingfeedError) {
      return c.json({ error: err.message, code: err.code, details: err.details }, errorCodeToHttpStatus(err.code));
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
      return 400;
    case 'VALIDATION_REJECTED':
      return 422;
    case 'SOURCE_UNAVAILABLE':
    case 'PUBLISH_TRANSIENT':
      return 502;
    case 'RATE_LIMITED':
      return 429;
    default:
      return 500;
  }
}

export interface StatusServer {
  close(): Promise<void>;
}

/** Serve the status surface in-process next to the collector loop. */
export function startStatusServer(ctx: AppContext): StatusServer {
  const { port, host } = ctx.config.server;
  const app = createApp(ctx);

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ port: info.port, host }, 'Status server listening');
  });

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
