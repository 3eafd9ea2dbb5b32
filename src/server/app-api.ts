import { Hono } from 'hono';
import { compareSync } from 'bcryptjs';
import { z } from 'zod';
import type { SqlTools } from '../tools/sql-tools.js';

interface AppApiDeps {
  tools: SqlTools;
  /** bcrypt hash of the accepted API key; no auth when undefined. */
  apiKeyHash?: string;
}

const queryBodySchema = z.object({
  sql: z.string().refine((sql) => sql.trim().length > 0),
});

export function createAppApi(deps: AppApiDeps): Hono {
  const app = new Hono();

  // Auth middleware
  app.use('*', async (c, next) => {
    if (!deps.apiKeyHash) {
      await next();
      return;
    }

    const authHeader = c.req.header('Authorization');
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return c.json({ ok: false, error: { code: 'UNAUTHORIZED', message: 'Missing or invalid Authorization header' } }, 401);
    }

    const token = authHeader.slice('Bearer '.length);
    if (!compareSync(token, deps.apiKeyHash)) {
      return c.json({ ok: false, error: { code: 'UNAUTHORIZED', message: 'Invalid API key' } }, 401);
    }

    await next();
  });

  // POST /query: raw SQL pass-through
  app.post('/query', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = queryBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ ok: false, error: { code: 'BAD_REQUEST', message: 'Missing required field: sql' } }, 400);
    }

    return c.json(deps.tools.executeQuery(parsed.data.sql));
  });

  // GET /info: schema plus sample rows
  app.get('/info', (c) => c.json(deps.tools.getDatabaseInfo()));

  return app;
}
