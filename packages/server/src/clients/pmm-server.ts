import { Agent, fetch as undiciFetch } from 'undici';
import { z } from 'zod';
import { AuthError, ConnectivityError, ProviderError, describeFetchError } from '../errors.js';
import { type FetchFn, readJson } from './http.js';

/** `"host:port"` → PMM service name, for every service PMM already monitors */
export type MonitoredServiceIndex = ReadonlyMap<string, string>;

const SERVICE_GROUPS = ['postgresql', 'mysql', 'mongodb', 'services'] as const;

const PmmService = z.object({
  service_name: z.string().default(''),
  address: z.string().optional(),
  port: z.union([z.number(), z.string()]).optional(),
});

export function serviceKey(host: string, port: number | string): string {
  return `${host}:${port}`;
}

export interface PmmServerClientOptions {
  /** e.g. https://127.0.0.1:443 */
  baseUrl: string;
  /**
   * Verify the server certificate (default: false). PMM ships with a
   * self-signed one. Ignored when fetchFn is given.
   */
  tlsVerify?: boolean;
  fetchFn?: FetchFn;
}

/**
 * Node.js native fetch ignores https.Agent, so skipping certificate checks
 * needs undici's own fetch with a dispatcher.
 */
function selfSignedFetch(): FetchFn {
  const agent = new Agent({ connect: { rejectUnauthorized: false } });
  return ((input: string | URL | Request, init?: RequestInit) =>
    undiciFetch(input, {
      ...init,
      dispatcher: agent,
    } as Parameters<typeof undiciFetch>[1])) as FetchFn;
}

/** Read-only access to the PMM server management API, authenticated as `admin` */
export class PmmServerClient {
  readonly baseUrl: string;
  private fetchFn: FetchFn;

  constructor(options: PmmServerClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchFn =
      options.fetchFn ??
      (options.tlsVerify ? globalThis.fetch.bind(globalThis) : selfSignedFetch());
  }

  async listServices(password: string): Promise<Record<string, unknown>> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.baseUrl}/v1/management/services`, {
        headers: {
          Accept: 'application/json',
          Authorization: `Basic ${Buffer.from(`admin:${password}`).toString('base64')}`,
        },
      });
    } catch (error) {
      throw new ConnectivityError(
        `Cannot reach PMM server at ${this.baseUrl}: ${describeFetchError(error)}`,
        { cause: error },
      );
    }

    if (res.status === 401 || res.status === 403) {
      throw new AuthError('Invalid PMM admin password.');
    }
    if (!res.ok) {
      throw new ProviderError(`PMM server returned ${res.status}: ${res.statusText}`, res.status);
    }

    const body = await readJson(res, 'PMM server');
    const parsed = z.record(z.unknown()).safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('Unexpected response from PMM server.');
    }
    return parsed.data;
  }

  async validateCredentials(password: string): Promise<void> {
    await this.listServices(password);
  }

  async listMonitored(password: string): Promise<MonitoredServiceIndex> {
    const services = await this.listServices(password);
    const index = new Map<string, string>();

    for (const group of SERVICE_GROUPS) {
      const entries = services[group];
      if (!Array.isArray(entries)) continue;

      for (const entry of entries) {
        const service = PmmService.safeParse(entry);
        if (!service.success || !service.data.address) continue;
        index.set(serviceKey(service.data.address, service.data.port ?? ''), service.data.service_name);
      }
    }

    return index;
  }
}
