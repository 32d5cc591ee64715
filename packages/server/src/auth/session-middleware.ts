import type { MiddlewareHandler } from 'hono';
import { getSignedCookie, setSignedCookie } from 'hono/cookie';
import type { WorkflowSession } from '../workflow/session.js';
import type { SessionManager } from './sessions.js';

export const SESSION_COOKIE = 'pmm_link_session';

const COOKIE_MAX_AGE_S = 60 * 60;

export type AppEnv = {
  Variables: {
    session: WorkflowSession;
  };
};

export interface SessionCookieOptions {
  secret: string;
  /** Mark the cookie Secure; set when served over TLS */
  secure: boolean;
}

/**
 * Session middleware for Hono.
 *
 * Reads the signed session cookie and attaches the workflow session. Unlike a
 * login session, a missing or expired one is replaced by a fresh workflow at
 * step 1, so every request downstream has a session.
 */
export function sessionMiddleware(
  sessionManager: SessionManager,
  options: SessionCookieOptions,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const cookie = await getSignedCookie(c, options.secret, SESSION_COOKIE);
    const existing = cookie ? sessionManager.getSession(cookie) : null;

    let sessionId: string;
    if (cookie && existing) {
      sessionId = cookie;
      c.set('session', existing);
      // Sliding window: extend session on each valid request
      sessionManager.touchSession(sessionId);
    } else {
      const created = sessionManager.createSession();
      sessionId = created.id;
      c.set('session', created.workflow);
    }

    await setSignedCookie(c, SESSION_COOKIE, sessionId, options.secret, {
      httpOnly: true,
      secure: options.secure,
      sameSite: 'Lax',
      path: '/',
      maxAge: COOKIE_MAX_AGE_S,
    });

    await next();
  };
}
