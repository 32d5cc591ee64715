import crypto from 'node:crypto';
import path from 'node:path';
import { DEFAULT_DO_API_BASE, DEFAULT_PMM_BASE_URL, DEFAULT_SERVER_PORT } from '@pmm-link/shared';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServerConfig {
  port: number;
  host: string;
  /** PMM server API as seen from this host */
  pmmBaseUrl: string;
  /** Verify the PMM server's TLS certificate (PMM ships self-signed by default) */
  pmmTlsVerify: boolean;
  /** Explicit pmm-admin invocation, e.g. `docker exec pmm-client pmm-admin` */
  pmmAdminCmd?: string[];
  pmmServerUrlOverride?: string;
  doApiBase: string;
  sessionSecret: string;
  tlsCertDir: string;
  logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function parseUrl(name: string, value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`${name} must be an absolute URL, got "${value}".`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new Error(`${name} must use http or https.`);
  }
  return value.replace(/\/+$/, '');
}

export function loadConfig(): ServerConfig {
  const port = Number(process.env.PORT) || DEFAULT_SERVER_PORT;
  if (process.env.PORT && (port < 1 || port > 65535 || !Number.isInteger(port))) {
    throw new Error('PORT must be between 1 and 65535.');
  }

  let sessionSecret = process.env.SESSION_SECRET;
  if (sessionSecret !== undefined && sessionSecret.length < 16) {
    throw new Error('SESSION_SECRET must be at least 16 characters.');
  }
  // Sessions live in memory, so a per-process secret loses nothing on restart.
  sessionSecret ??= crypto.randomBytes(32).toString('hex');

  const logLevel = process.env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: "${logLevel}". Must be one of ${LOG_LEVELS.join(', ')}.`);
  }

  const adminCmd = process.env.PMM_ADMIN_CMD?.trim().split(/\s+/).filter(Boolean);
  const serverUrlOverride = process.env.PMM_SERVER_URL_OVERRIDE?.trim();

  return {
    port,
    host: process.env.LISTEN_HOST ?? process.env.HOST ?? '0.0.0.0',
    pmmBaseUrl: parseUrl('PMM_BASE_URL', process.env.PMM_BASE_URL ?? DEFAULT_PMM_BASE_URL),
    pmmTlsVerify: process.env.PMM_TLS_VERIFY === 'true',
    doApiBase: parseUrl('DO_API_BASE', process.env.DO_API_BASE ?? DEFAULT_DO_API_BASE),
    sessionSecret,
    tlsCertDir: process.env.TLS_CERT_DIR ?? path.resolve('certs'),
    logLevel,
    ...(adminCmd && adminCmd.length > 0 ? { pmmAdminCmd: adminCmd } : {}),
    ...(serverUrlOverride ? { pmmServerUrlOverride: serverUrlOverride } : {}),
  };
}
