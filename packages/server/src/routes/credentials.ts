import { ValidatePmmBody, ValidateTokenBody } from '@pmm-link/shared';
import { Hono } from 'hono';
import type { AppDeps } from '../app.js';
import type { AppEnv } from '../auth/session-middleware.js';
import { readBody } from '../http/body.js';
import { logger } from '../logger.js';
import { resolveSecret } from '../workflow/secrets.js';
import type { SecretField, WorkflowSession } from '../workflow/session.js';

async function validateInto(
  session: WorkflowSession,
  field: SecretField,
  secret: string,
  check: (secret: string) => Promise<void>,
): Promise<void> {
  try {
    await check(secret);
  } catch (error) {
    session.recordCredential(field, secret, false);
    throw error;
  }
  session.recordCredential(field, secret, true);
  logger.info({ field, step: session.step }, 'Credential validated');
}

export function createCredentialRoutes(deps: Pick<AppDeps, 'cloud' | 'pmmServer'>): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/validate-token
  routes.post('/validate-token', async (c) => {
    const session = c.get('session');
    const body = await readBody(c, ValidateTokenBody);
    const token = resolveSecret(session, 'doToken', body.do_token);

    await validateInto(session, 'doToken', token, (t) => deps.cloud.validateToken(t));
    return c.json({ ok: true });
  });

  // POST /api/validate-pmm
  routes.post('/validate-pmm', async (c) => {
    const session = c.get('session');
    const body = await readBody(c, ValidatePmmBody);
    const password = resolveSecret(session, 'pmmPassword', body.pmm_password);

    await validateInto(session, 'pmmPassword', password, (p) =>
      deps.pmmServer.validateCredentials(p),
    );
    return c.json({ ok: true });
  });

  return routes;
}
