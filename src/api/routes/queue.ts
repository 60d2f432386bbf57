import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';

const LimitQuery = z.coerce.number().int().min(1).max(500).catch(100);

export function queueRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/queue?status=pending|dead_letter
  app.get('/queue', (c) => {
    const limit = LimitQuery.parse(c.req.query('limit'));
    const status = c.req.query('status') === 'dead_letter' ? 'dead_letter' : 'pending';
    const tasks = status === 'dead_letter' ? ctx.queue.listDeadLetters(limit) : ctx.queue.listPending(limit);
    return c.json({ status, tasks, counts: ctx.queue.counts() });
  });

  // POST /api/queue/:id/requeue: put a dead letter back on the schedule
  app.post('/queue/:id/requeue', (c) => {
    const task = ctx.queue.requeue(c.req.param('id'), ctx.now());
    if (!task) {
      return c.json({ error: 'No dead letter with that id, or its entity is already pending' }, 404);
    }
    return c.json(task);
  });

  return app;
}
