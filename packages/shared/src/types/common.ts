import { z } from 'zod';

export const EngineId = z.enum(['pg', 'mysql', 'mongodb']);
export type EngineId = z.infer<typeof EngineId>;

export const WorkflowStep = z.enum([
  'credentials',
  'engine',
  'discovery',
  'provisioning',
  'integration',
]);
export type WorkflowStep = z.infer<typeof WorkflowStep>;

export const CredentialStatus = z.enum(['unknown', 'valid', 'invalid']);
export type CredentialStatus = z.infer<typeof CredentialStatus>;

export const CredentialMode = z.enum(['auto', 'manual']);
export type CredentialMode = z.infer<typeof CredentialMode>;

export const ErrorCode = z.enum([
  'auth',
  'permission',
  'connectivity',
  'user_exists',
  'provider',
  'registration',
  'not_found',
  'validation',
]);
export type ErrorCode = z.infer<typeof ErrorCode>;

/** Default listen port for the workflow server */
export const DEFAULT_SERVER_PORT = 8443;

/** PMM server reachable from the host running pmm-admin */
export const DEFAULT_PMM_BASE_URL = 'https://127.0.0.1:443';

export const DEFAULT_DO_API_BASE = 'https://api.digitalocean.com/v2';

/** Database user created for the monitoring agent when none is given */
export const DEFAULT_MONITORING_USERNAME = 'pmm_monitor';

/** Timeout applied to DigitalOcean API calls */
export const DO_REQUEST_TIMEOUT_MS = 15_000;
