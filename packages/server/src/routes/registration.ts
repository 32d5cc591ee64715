import { IntegrateBody, RemoveBody } from '@pmm-link/shared';
import { Hono } from 'hono';
import type { AppDeps } from '../app.js';
import type { AppEnv } from '../auth/session-middleware.js';
import { readBody } from '../http/body.js';
import { requireEngine, requireSupportedEngine } from '../workflow/engines.js';
import { withSecret } from '../workflow/secrets.js';

export function createRegistrationRoutes(
  deps: Pick<AppDeps, 'engines' | 'pmmAdmin'>,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/integrate
  routes.post('/integrate', async (c) => {
    const session = c.get('session');
    const body = await readBody(c, IntegrateBody);
    const adapter = requireSupportedEngine(deps.engines, body.engine);

    const { output } = await withSecret(session, 'pmmPassword', body.pmm_password, (password) =>
      deps.pmmAdmin.register(adapter, body.instance, password),
    );
    return c.json({ ok: true, output, post_steps: adapter.postSteps(body.instance) });
  });

  // POST /api/remove
  routes.post('/remove', async (c) => {
    const session = c.get('session');
    const body = await readBody(c, RemoveBody);
    const adapter = requireEngine(deps.engines, body.engine);

    const { output } = await withSecret(session, 'pmmPassword', body.pmm_password, (password) =>
      deps.pmmAdmin.remove(adapter.serviceType, body.service_name, password),
    );
    return c.json({ ok: true, output });
  });

  return routes;
}
