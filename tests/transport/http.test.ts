import { describe, it, expect, afterEach, vi } from 'vitest';
import { FetchTransport } from '../../src/transport/index.js';
import { TransportError } from '../../src/utils/errors.js';

const URL = 'https://patches.test/6.13/x.patch';

function transport() {
  return new FetchTransport({ timeoutMs: 1000, userAgent: 'test-agent' });
}

function stubFetch(impl: () => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

async function collect(body: AsyncIterable<Uint8Array>): Promise<string> {
  const parts: Uint8Array[] = [];
  for await (const chunk of body) parts.push(chunk);
  return Buffer.concat(parts).toString('utf-8');
}

describe('FetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should stream the body with length and validators', async () => {
    stubFetch(async () =>
      new Response('abc', {
        status: 200,
        headers: { etag: '"v1"', 'last-modified': 'Mon, 06 Jan 2025 10:00:00 GMT', 'content-length': '3' },
      })
    );

    const response = await transport().get(URL);

    expect(response.status).toBe(200);
    expect(response.contentLength).toBe(3);
    expect(response.validators).toEqual({ etag: '"v1"', lastModified: 'Mon, 06 Jan 2025 10:00:00 GMT' });
    expect(await collect(response.body)).toBe('abc');
  });

  it('should not trust the length of content-encoded bodies', async () => {
    stubFetch(async () =>
      new Response('abc', { status: 200, headers: { 'content-encoding': 'gzip', 'content-length': '20' } })
    );

    const response = await transport().get(URL);

    expect(response.contentLength).toBeNull();
  });

  it('should send HEAD requests with the user agent', async () => {
    const fetchMock = stubFetch(async () => new Response(null, { status: 200, headers: { etag: '"v2"' } }));

    const response = await transport().head(URL);

    expect(response.validators).toEqual({ etag: '"v2"', lastModified: null });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]).toEqual([
      URL,
      expect.objectContaining({ method: 'HEAD', headers: { 'User-Agent': 'test-agent' } }),
    ]);
  });

  it('should return page text', async () => {
    stubFetch(async () => new Response('<html></html>', { status: 200 }));

    expect(await transport().getText(URL)).toBe('<html></html>');
  });

  it('should reject non-success statuses', async () => {
    stubFetch(async () => new Response('', { status: 404, statusText: 'Not Found' }));

    const error = await transport().get(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ code: 'TRANSPORT.STATUS', status: 404, message: `GET ${URL} failed: 404 Not Found` });
  });

  it('should classify timeouts', async () => {
    stubFetch(async () => {
      const error = new Error('The operation was aborted due to timeout');
      error.name = 'TimeoutError';
      throw error;
    });

    await expect(transport().head(URL)).rejects.toMatchObject({
      code: 'TRANSPORT.TIMEOUT',
      message: `Request to ${URL} timed out after 1000ms`,
    });
  });

  it('should classify connection failures', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(transport().getText(URL)).rejects.toMatchObject({
      code: 'TRANSPORT.NETWORK',
      message: `Request to ${URL} failed: fetch failed`,
    });
  });
});
