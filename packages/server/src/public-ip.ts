import dgram from 'node:dgram';
import { isIPv4 } from 'node:net';
import type { FetchFn } from './clients/http.js';
import { logger } from './logger.js';

const METADATA_URL = 'http://169.254.169.254/metadata/v1/interfaces/public/0/ipv4/address';
const ECHO_URLS = ['https://api.ipify.org', 'https://ifconfig.me/ip'];

/** Source address the kernel would use for outbound traffic */
export type LocalAddressFn = () => Promise<string | null>;

export const udpLocalAddress: LocalAddressFn = () =>
  new Promise((resolve) => {
    const socket = dgram.createSocket('udp4');
    socket.once('error', (error) => {
      logger.debug({ err: error }, 'UDP route lookup failed');
      socket.close();
      resolve(null);
    });
    // connect() on UDP sends nothing; it only picks the route.
    socket.connect(80, '8.8.8.8', () => {
      const { address } = socket.address();
      socket.close();
      resolve(address);
    });
  });

async function fetchAddress(fetchFn: FetchFn, url: string, timeoutMs: number): Promise<string | null> {
  try {
    const res = await fetchFn(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!res.ok) return null;
    const text = (await res.text()).trim();
    return isIPv4(text) ? text : null;
  } catch (error) {
    logger.debug({ url, err: error }, 'Public address lookup failed');
    return null;
  }
}

export interface PublicIpOptions {
  fetchFn?: FetchFn;
  localAddress?: LocalAddressFn;
}

/**
 * Best guess at the host's public IPv4 for the start-up banner: the droplet
 * metadata service, then public echo services, then the outbound interface.
 */
export async function detectPublicIpv4(options: PublicIpOptions = {}): Promise<string> {
  const fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
  const localAddress = options.localAddress ?? udpLocalAddress;

  const fromMetadata = await fetchAddress(fetchFn, METADATA_URL, 2000);
  if (fromMetadata) return fromMetadata;

  for (const url of ECHO_URLS) {
    const address = await fetchAddress(fetchFn, url, 3000);
    if (address) return address;
  }

  const local = await localAddress();
  return local && isIPv4(local) ? local : '0.0.0.0';
}
