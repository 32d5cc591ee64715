import { DatabasesBody } from '@pmm-link/shared';
import { Hono } from 'hono';
import type { AppDeps } from '../app.js';
import type { AppEnv } from '../auth/session-middleware.js';
import { readBody } from '../http/body.js';
import { discoverDatabases } from '../workflow/discovery.js';
import { requireSupportedEngine } from '../workflow/engines.js';

export function createDiscoveryRoutes(
  deps: Pick<AppDeps, 'engines' | 'cloud' | 'pmmServer'>,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/engines
  routes.get('/engines', (c) => c.json({ engines: deps.engines.describe() }));

  // POST /api/databases
  routes.post('/databases', async (c) => {
    const session = c.get('session');
    const body = await readBody(c, DatabasesBody);
    const adapter = requireSupportedEngine(deps.engines, body.engine);

    const databases = await discoverDatabases(deps, session, adapter, {
      doToken: body.do_token,
      pmmPassword: body.pmm_password,
      usePrivate: body.use_private ?? session.usePrivate,
    });
    return c.json({ ok: true, databases });
  });

  return routes;
}
