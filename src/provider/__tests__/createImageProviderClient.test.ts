import { describe, it, expect, vi } from 'vitest';
import { createImageProviderClient } from '../createImageProviderClient';
import type { FetchLike } from '../createImageProviderClient';
import type { ImageProviderRequest } from '../../config/types';
import { FetchError } from '../../errors';

const request: ImageProviderRequest = {
  attributes: [{ name: 'sys/dev/temp', y_axis: 0 }],
  time_range: ['2024-01-01T00:00:00.000Z', '2024-01-01T01:00:00.000Z'],
  size: [100, 50],
  axes: { '0': { scale: 'linear' }, '1': { scale: 'log' } },
};

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('createImageProviderClient', () => {
  it('POSTs the request as JSON and parses the reply', async () => {
    const fetchMock = vi.fn(async (_input: string, _init: RequestInit) =>
      jsonResponse({ descs: {}, images: { '0': { image: 'IMG', x_range: [0, 1], y_range: [0, 1] } } })
    );
    const provider = createImageProviderClient({
      endpoint: '/image',
      fetch: fetchMock,
      headers: { Authorization: 'Bearer test-token' },
    });

    const response = await provider(request);

    expect(response.images?.['0']?.image).toBe('IMG');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [input, init] = fetchMock.mock.calls[0];
    expect(input).toBe('/image');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-token' });
    expect(JSON.parse(String(init.body))).toEqual(request);
  });

  it('skips the request when no attributes are configured', async () => {
    const fetchMock = vi.fn(async (_input: string, _init: RequestInit): Promise<Response> => jsonResponse({}));
    const doFetch: FetchLike = fetchMock;
    const provider = createImageProviderClient({ endpoint: '/image', fetch: doFetch });

    await expect(provider({ ...request, attributes: [] })).resolves.toEqual({ descs: {}, images: {} });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects with the HTTP status on an error response', async () => {
    const provider = createImageProviderClient({
      endpoint: '/image',
      fetch: async () => jsonResponse({ error: 'boom' }, 503),
    });

    const error = await provider(request).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 503, message: 'Image provider responded with status 503' });
  });

  it('rejects with a null status when the transport fails', async () => {
    const provider = createImageProviderClient({
      endpoint: '/image',
      fetch: async () => {
        throw new TypeError('network down');
      },
    });

    const error = await provider(request).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: null, message: 'Could not fetch archive data: network down' });
  });

  it('rejects on a body that is not JSON', async () => {
    const provider = createImageProviderClient({
      endpoint: '/image',
      fetch: async () => new Response('<html>', { status: 200 }),
    });

    await expect(provider(request)).rejects.toThrow('Image provider returned invalid JSON');
  });
});
