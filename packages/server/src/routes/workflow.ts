import {
  EngineBody,
  ManualCredentialBody,
  SelectionBody,
  StepBody,
  type DatabaseRecord,
} from '@pmm-link/shared';
import { Hono } from 'hono';
import type { AppDeps } from '../app.js';
import type { AppEnv } from '../auth/session-middleware.js';
import { ValidationError } from '../errors.js';
import { readBody } from '../http/body.js';
import { logger } from '../logger.js';
import { discoverDatabases } from '../workflow/discovery.js';
import { requireEngine, requireSupportedEngine } from '../workflow/engines.js';
import { integrateSelection } from '../workflow/integration.js';
import { resolveSecret } from '../workflow/secrets.js';
import type { WorkflowSession } from '../workflow/session.js';

function sessionEngine(deps: Pick<AppDeps, 'engines'>, session: WorkflowSession) {
  if (!session.engine) {
    throw new ValidationError('Choose a supported engine first.');
  }
  return requireSupportedEngine(deps.engines, session.engine);
}

export function createWorkflowRoutes(
  deps: Pick<AppDeps, 'engines' | 'cloud' | 'pmmServer' | 'pmmAdmin'>,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/workflow
  routes.get('/', (c) => c.json(c.get('session').snapshot()));

  // POST /api/workflow/step
  routes.post('/step', async (c) => {
    const session = c.get('session');
    const { step } = await readBody(c, StepBody);
    session.goTo(step);
    return c.json(session.snapshot());
  });

  // POST /api/workflow/engine
  routes.post('/engine', async (c) => {
    const session = c.get('session');
    const body = await readBody(c, EngineBody);
    session.selectEngine(requireEngine(deps.engines, body.engine), body.use_private);
    return c.json(session.snapshot());
  });

  // POST /api/workflow/selection (re-discovers, so stale ids are rejected)
  routes.post('/selection', async (c) => {
    const session = c.get('session');
    const { db_ids } = await readBody(c, SelectionBody);
    const adapter = sessionEngine(deps, session);

    const databases = await discoverDatabases(deps, session, adapter, {
      usePrivate: session.usePrivate,
    });
    const byId = new Map(databases.map((db) => [db.id, db]));

    const picked: DatabaseRecord[] = db_ids.map((id) => {
      const db = byId.get(id);
      if (!db) throw new ValidationError(`Unknown database: ${id}`);
      return db;
    });
    session.select(picked);
    return c.json(session.snapshot());
  });

  // POST /api/workflow/credentials: manual credential for one selected database
  routes.post('/credentials', async (c) => {
    const session = c.get('session');
    const body = await readBody(c, ManualCredentialBody);
    session.setCredential(body.db_id, {
      mode: 'manual',
      username: body.username,
      password: body.password,
      ready: true,
    });
    return c.json(session.snapshot());
  });

  // POST /api/workflow/integrate
  routes.post('/integrate', async (c) => {
    const session = c.get('session');
    const adapter = sessionEngine(deps, session);
    session.goTo('integration');
    const password = resolveSecret(session, 'pmmPassword', undefined);

    const results = await integrateSelection(session.selected(), adapter, deps.pmmAdmin, password);
    logger.info(
      { engine: adapter.id, total: results.length, failed: results.filter((r) => !r.ok).length },
      'Integration run finished',
    );

    session.completeIntegration(results);
    return c.json({ ok: true, results, workflow: session.snapshot() });
  });

  // POST /api/workflow/reset
  routes.post('/reset', (c) => {
    const session = c.get('session');
    session.reset();
    return c.json(session.snapshot());
  });

  return routes;
}
