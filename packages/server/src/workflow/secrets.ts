import { AuthError, ValidationError } from '../errors.js';
import type { SecretField, WorkflowSession } from './session.js';

const MISSING: Record<SecretField, string> = {
  doToken: 'DigitalOcean API token is required.',
  pmmPassword: 'PMM admin password is required.',
};

/** The secret sent with the request, or the one validated earlier in this session */
export function resolveSecret(
  session: WorkflowSession,
  field: SecretField,
  provided: string | undefined,
): string {
  const value = provided || session[field];
  if (!value) {
    throw new ValidationError(MISSING[field]);
  }
  return value;
}

/**
 * Run an upstream call with a secret. When the session's own secret is
 * rejected (expired or revoked mid-flow), the session falls back to step 1.
 */
export async function withSecret<T>(
  session: WorkflowSession,
  field: SecretField,
  provided: string | undefined,
  task: (secret: string) => Promise<T>,
): Promise<T> {
  const secret = resolveSecret(session, field, provided);
  try {
    return await task(secret);
  } catch (error) {
    if (error instanceof AuthError && secret === session[field]) {
      session.invalidate(field);
    }
    throw error;
  }
}
