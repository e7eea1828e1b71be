import type { ImageProvider, ImageProviderResponse } from '../config/types';
import { FetchError } from '../errors';
import { parseImageProviderResponse } from './parseResponse';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ImageProviderClientOptions {
  /** URL the request is POSTed to as JSON. */
  readonly endpoint: string;
  /** Defaults to the global `fetch`. */
  readonly fetch?: FetchLike;
  readonly headers?: Readonly<Record<string, string>>;
}

const EMPTY_RESPONSE: ImageProviderResponse = { descs: {}, images: {} };

/**
 * `ImageProvider` backed by an HTTP endpoint. Non-2xx statuses and transport
 * failures reject with `FetchError`.
 */
export function createImageProviderClient(options: ImageProviderClientOptions): ImageProvider {
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  return async (request) => {
    if (request.attributes.length === 0) return EMPTY_RESPONSE;

    let response: Response;
    try {
      response = await doFetch(options.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...options.headers },
        body: JSON.stringify(request),
      });
    } catch (err) {
      throw new FetchError(`Could not fetch archive data: ${err instanceof Error ? err.message : String(err)}`, null, {
        cause: err,
      });
    }

    if (!response.ok) {
      throw new FetchError(`Image provider responded with status ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new FetchError('Image provider returned invalid JSON', response.status, { cause: err });
    }
    return parseImageProviderResponse(body);
  };
}
