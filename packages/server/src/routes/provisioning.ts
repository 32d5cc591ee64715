import { CreateUserBody } from '@pmm-link/shared';
import { Hono } from 'hono';
import type { AppDeps } from '../app.js';
import type { AppEnv } from '../auth/session-middleware.js';
import { readBody } from '../http/body.js';
import { logger } from '../logger.js';
import { requireSupportedEngine } from '../workflow/engines.js';
import { withSecret } from '../workflow/secrets.js';

export function createProvisioningRoutes(deps: Pick<AppDeps, 'engines' | 'cloud'>): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/create-user
  routes.post('/create-user', async (c) => {
    const session = c.get('session');
    const body = await readBody(c, CreateUserBody);
    const adapter = requireSupportedEngine(deps.engines, body.engine);

    const user = await withSecret(session, 'doToken', body.do_token, (token) =>
      deps.cloud.createUser(token, {
        dbId: body.db_id,
        dbName: body.db_name,
        username: body.username,
        fields: adapter.userFields(body.username),
      }),
    );
    logger.info({ dbId: body.db_id, username: user.username }, 'Created monitoring user');

    if (session.isSelected(body.db_id)) {
      session.setCredential(body.db_id, {
        mode: 'auto',
        username: user.username,
        password: user.password,
        ready: true,
      });
    }

    return c.json({ ok: true, username: user.username, password: user.password });
  });

  return routes;
}
