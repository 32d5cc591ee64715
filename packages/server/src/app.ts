import type { EngineRegistry } from '@pmm-link/engines';
import { Hono } from 'hono';
import { type AppEnv, sessionMiddleware } from './auth/session-middleware.js';
import type { SessionManager } from './auth/sessions.js';
import type { DigitalOceanClient } from './clients/digitalocean.js';
import type { PmmAdmin } from './clients/pmm-admin.js';
import type { PmmServerClient } from './clients/pmm-server.js';
import { WorkflowError } from './errors.js';
import { logger } from './logger.js';
import { createCredentialRoutes } from './routes/credentials.js';
import { createDiscoveryRoutes } from './routes/discovery.js';
import { createProvisioningRoutes } from './routes/provisioning.js';
import { createRegistrationRoutes } from './routes/registration.js';
import { createWorkflowRoutes } from './routes/workflow.js';

export interface AppDeps {
  engines: EngineRegistry;
  cloud: DigitalOceanClient;
  pmmServer: PmmServerClient;
  pmmAdmin: PmmAdmin;
  sessions: SessionManager;
  sessionSecret: string;
  /** Served over TLS: session cookies get the Secure flag */
  secureCookies: boolean;
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  app.use(
    '/api/*',
    sessionMiddleware(deps.sessions, { secret: deps.sessionSecret, secure: deps.secureCookies }),
  );

  app.route('/api', createCredentialRoutes(deps));
  app.route('/api', createDiscoveryRoutes(deps));
  app.route('/api', createProvisioningRoutes(deps));
  app.route('/api', createRegistrationRoutes(deps));
  app.route('/api/workflow', createWorkflowRoutes(deps));

  app.notFound((c) => c.json({ ok: false, message: 'Not found' }, 404));

  app.onError((err, c) => {
    if (err instanceof WorkflowError) {
      logger.warn(
        { path: c.req.path, code: err.code, status: err.status, message: err.message },
        'Request failed',
      );
      return c.json(err.toBody(), err.status);
    }
    logger.error({ err, path: c.req.path }, 'Unhandled request error');
    return c.json({ ok: false, message: 'Internal server error' }, 500);
  });

  return app;
}
