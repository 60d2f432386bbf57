import { Hono } from 'hono';
import type { AppContext } from '../server.js';

const VERSION = '0.1.0';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health: liveness of the collector process
  app.get('/health', (c) => {
    const status = ctx.orchestrator.status();
    return c.json({
      status: 'ok',
      version: VERSION,
      running: status.running,
      cycles: status.cycles,
      uptime_ms: status.uptime_ms,
      last_heartbeat: status.last_heartbeat,
    });
  });

  // GET /api/status: per-source circuit and budget state plus queue depth
  app.get('/status', (c) => {
    return c.json(ctx.orchestrator.status());
  });

  // POST /api/sources/:name/reset: close a source's circuit by hand
  app.post('/sources/:name/reset', (c) => {
    const name = c.req.param('name');
    if (!ctx.registry.names().includes(name)) {
      return c.json({ error: `Unknown source: ${name}` }, 404);
    }
    const breaker = ctx.registry.breakerFor(name);
    breaker.reset();
    return c.json({ source: name, circuit: breaker.snapshot() });
  });

  return app;
}
