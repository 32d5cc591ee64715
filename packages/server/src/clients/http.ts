import { ProviderError } from '../errors.js';

export type FetchFn = typeof globalThis.fetch;

/** Body of a 2xx answer; a proxy or login page in its place is a ProviderError */
export async function readJson(res: Response, source: string): Promise<unknown> {
  try {
    return await res.json();
  } catch (error) {
    throw new ProviderError(`Unexpected response from ${source}.`, res.status, { cause: error });
  }
}
