import type { SupportedEngineAdapter } from '@pmm-link/engines';
import type { DatabaseRecord } from '@pmm-link/shared';
import type { DigitalOceanClient } from '../clients/digitalocean.js';
import type { MonitoredServiceIndex, PmmServerClient } from '../clients/pmm-server.js';
import { logger } from '../logger.js';
import { withSecret } from './secrets.js';
import type { WorkflowSession } from './session.js';

export interface DiscoveryDeps {
  cloud: DigitalOceanClient;
  pmmServer: PmmServerClient;
}

export interface DiscoveryOptions {
  doToken?: string;
  pmmPassword?: string;
  usePrivate: boolean;
}

const EMPTY_INDEX: MonitoredServiceIndex = new Map();

// Best effort: without the PMM index every database is listed as not monitored.
async function monitoredIndex(
  pmmServer: PmmServerClient,
  password: string | undefined,
): Promise<MonitoredServiceIndex> {
  if (!password) {
    logger.warn('No PMM password available; monitored status not checked');
    return EMPTY_INDEX;
  }
  try {
    return await pmmServer.listMonitored(password);
  } catch (error) {
    logger.warn({ err: error }, 'Could not list PMM services; monitored status not checked');
    return EMPTY_INDEX;
  }
}

/** Fresh list of the engine's clusters; never cached, so removals show up immediately */
export async function discoverDatabases(
  deps: DiscoveryDeps,
  session: WorkflowSession,
  adapter: SupportedEngineAdapter,
  options: DiscoveryOptions,
): Promise<DatabaseRecord[]> {
  const monitored = await monitoredIndex(
    deps.pmmServer,
    options.pmmPassword || session.pmmPassword,
  );
  const databases = await withSecret(session, 'doToken', options.doToken, (token) =>
    deps.cloud.listDatabases(token, adapter, options.usePrivate, monitored),
  );
  logger.info(
    { engine: adapter.id, count: databases.length, usePrivate: options.usePrivate },
    'Discovered databases',
  );
  return databases;
}
