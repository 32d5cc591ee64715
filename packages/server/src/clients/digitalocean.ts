import type { SupportedEngineAdapter } from '@pmm-link/engines';
import {
  DEFAULT_DO_API_BASE,
  DO_REQUEST_TIMEOUT_MS,
  type DatabaseRecord,
} from '@pmm-link/shared';
import { z } from 'zod';
import {
  AuthError,
  ConnectivityError,
  PermissionError,
  ProviderError,
  UserExistsError,
  describeFetchError,
} from '../errors.js';
import { logger } from '../logger.js';
import { type MonitoredServiceIndex, serviceKey } from './pmm-server.js';
import { type FetchFn, readJson } from './http.js';

const PER_PAGE = 100;
const MAX_PAGES = 50;

// --- Response shapes (only the fields this service reads) ---

const Connection = z
  .object({
    host: z.string().nullish(),
    port: z.number().int().nullish(),
  })
  .nullish();

const DoDatabase = z.object({
  id: z.string(),
  name: z.string(),
  engine: z.string(),
  region: z.string().nullish(),
  status: z.string().nullish(),
  num_nodes: z.number().int().nullish(),
  connection: Connection,
  private_connection: Connection,
});
type DoDatabase = z.infer<typeof DoDatabase>;

const DatabaseList = z.object({
  databases: z.array(DoDatabase).nullish(),
  links: z
    .object({
      pages: z.object({ next: z.string().nullish() }).nullish(),
    })
    .nullish(),
});

const DoUser = z.object({
  name: z.string(),
  role: z.string().nullish(),
  password: z.string().nullish(),
});

const UserEnvelope = z.object({ user: DoUser });

const ErrorEnvelope = z.object({ message: z.string() });

/** `message` of a DigitalOcean error body, or '' for anything else */
function errorMessage(text: string): string {
  try {
    const body = ErrorEnvelope.safeParse(JSON.parse(text));
    return body.success ? body.data.message : '';
  } catch {
    return '';
  }
}

export interface CreatedUser {
  username: string;
  password: string;
}

export interface UserStatus {
  username: string;
  role: string;
  /** DigitalOcean still returns the password for this user */
  hasPassword: boolean;
}

export interface CreateUserInput {
  dbId: string;
  dbName: string;
  username: string;
  /** Request body fields from the engine adapter */
  fields: Record<string, unknown>;
}

export interface DigitalOceanClientOptions {
  baseUrl?: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

/** Pick host/port from the private (VPC) block when asked and available */
export function resolveEndpoint(
  db: DoDatabase,
  usePrivate: boolean,
  defaultPort: number,
): { host: string; port: number } {
  const pub = db.connection;
  const priv = db.private_connection;

  if (usePrivate && priv?.host) {
    return { host: priv.host, port: priv.port ?? pub?.port ?? defaultPort };
  }
  return { host: pub?.host ?? '', port: pub?.port ?? defaultPort };
}

/** DigitalOcean managed databases API, authenticated per call with the caller's token */
export class DigitalOceanClient {
  private baseUrl: string;
  private fetchFn: FetchFn;
  private timeoutMs: number;

  constructor(options: DigitalOceanClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_DO_API_BASE).replace(/\/+$/, '');
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = options.timeoutMs ?? DO_REQUEST_TIMEOUT_MS;
  }

  async validateToken(token: string): Promise<void> {
    const res = await this.request(token, '/account');
    if (!res.ok) await this.fail(res, { forbiddenIsAuth: true });
  }

  /**
   * All clusters of the adapter's engine, in provider order, with
   * `monitored` set from the PMM service index.
   */
  async listDatabases(
    token: string,
    adapter: SupportedEngineAdapter,
    usePrivate: boolean,
    monitored: MonitoredServiceIndex,
  ): Promise<DatabaseRecord[]> {
    const records: DatabaseRecord[] = [];

    for (let page = 1; page <= MAX_PAGES; page++) {
      const res = await this.request(token, `/databases?page=${page}&per_page=${PER_PAGE}`);
      if (!res.ok) await this.fail(res);

      const body = DatabaseList.safeParse(await readJson(res, 'DigitalOcean API'));
      if (!body.success) {
        throw new ProviderError('Unexpected response from DigitalOcean API.');
      }

      for (const db of body.data.databases ?? []) {
        if (db.engine !== adapter.engineFilter) continue;

        const { host, port } = resolveEndpoint(db, usePrivate, adapter.defaultPort);
        const serviceName = monitored.get(serviceKey(host, port)) ?? '';
        records.push({
          id: db.id,
          name: db.name,
          engine: adapter.id,
          region: db.region ?? '',
          host,
          port,
          num_nodes: db.num_nodes ?? 1,
          status: db.status ?? 'unknown',
          monitored: serviceName !== '',
          pmm_service_name: serviceName,
        });
      }

      if (!body.data.links?.pages?.next) break;
    }

    return records;
  }

  /** Create a database user; an existing user raises UserExistsError */
  async createUser(token: string, input: CreateUserInput): Promise<CreatedUser> {
    const res = await this.request(token, `/databases/${encodeURIComponent(input.dbId)}/users`, {
      method: 'POST',
      body: JSON.stringify({ ...input.fields, name: input.username }),
    });

    if (res.status === 409) {
      const existing = await this.lookupExisting(token, input.dbId, input.username);
      throw new UserExistsError(existing?.username ?? input.username, {
        dbId: input.dbId,
        dbName: input.dbName,
        passwordRetrievable: existing?.hasPassword ?? false,
      });
    }
    if (!res.ok) await this.fail(res);

    const body = UserEnvelope.safeParse(await readJson(res, 'DigitalOcean API'));
    if (!body.success || !body.data.user.password) {
      throw new ProviderError('DigitalOcean did not return the new user password.');
    }
    return { username: body.data.user.name, password: body.data.user.password };
  }

  /** Status of an existing database user, or null when it does not exist */
  async fetchUser(token: string, dbId: string, username: string): Promise<UserStatus | null> {
    const res = await this.request(
      token,
      `/databases/${encodeURIComponent(dbId)}/users/${encodeURIComponent(username)}`,
    );
    if (res.status === 404) return null;
    if (!res.ok) await this.fail(res);

    const body = UserEnvelope.safeParse(await readJson(res, 'DigitalOcean API'));
    if (!body.success) {
      throw new ProviderError('Unexpected response from DigitalOcean API.');
    }
    const user = body.data.user;
    return { username: user.name, role: user.role ?? '', hasPassword: Boolean(user.password) };
  }

  // The conflict is reported either way; the lookup only refines the remediation.
  private async lookupExisting(
    token: string,
    dbId: string,
    username: string,
  ): Promise<UserStatus | null> {
    try {
      return await this.fetchUser(token, dbId, username);
    } catch (error) {
      logger.warn({ dbId, username, err: error }, 'Could not fetch existing database user');
      return null;
    }
  }

  private async request(token: string, path: string, init: RequestInit = {}): Promise<Response> {
    try {
      return await this.fetchFn(`${this.baseUrl}${path}`, {
        ...init,
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: `Bearer ${token}`,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new ConnectivityError(
        `Cannot reach DigitalOcean API: ${describeFetchError(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * A 403 only means a bad token while validating it. Later on it means a
   * token without the scope for that call, which must not end the session.
   */
  private async fail(res: Response, options: { forbiddenIsAuth?: boolean } = {}): Promise<never> {
    const detail = errorMessage(await res.text());

    if (res.status === 401) {
      throw new AuthError('Invalid DigitalOcean API token.');
    }
    if (res.status === 403) {
      const message = detail
        ? `DigitalOcean API token is not allowed to do this: ${detail}`
        : 'DigitalOcean API token is not allowed to do this.';
      throw options.forbiddenIsAuth ? new AuthError(message) : new PermissionError(message);
    }
    throw new ProviderError(
      detail || `DigitalOcean API returned ${res.status}: ${res.statusText}`,
      res.status,
    );
  }
}
