import { describe, it, expect, vi, beforeEach } from 'vitest';
import { UpstreamError } from '../errors.js';
import { makeNoopLogger } from '../logging/logger.js';
import { buildUrl, EMPTY_RESPONSE_RESULT, LinearBClient } from './linearb-client.js';

const mockFetch = vi.fn<typeof fetch>();

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });
}

/** A fetch that never settles until its signal aborts. */
function hangingFetch(): typeof fetch {
  return (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
    });
}

function createClient(fetchFn: typeof fetch = mockFetch, timeoutMs = 5_000): LinearBClient {
  return new LinearBClient({
    baseUrl: 'https://api.example.test/',
    apiKey: 'test-secret',
    timeoutMs,
    log: makeNoopLogger(),
    fetchFn,
  });
}

describe('LinearBClient', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('sends GET requests with the API key and query string', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ items: [] }));

    const result = await createClient().get('/api/v1/deployments', { limit: 10, stage: undefined, flag: false });

    expect(result).toEqual({ items: [] });
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('https://api.example.test/api/v1/deployments?limit=10&flag=false');
    expect(init?.method).toBe('GET');
    expect(init?.body).toBeUndefined();
    expect(init?.headers).toMatchObject({ 'x-api-key': 'test-secret', 'Content-Type': 'application/json' });
  });

  it('sends POST bodies as JSON', async () => {
    mockFetch.mockResolvedValue(jsonResponse([{ value: 1 }]));

    await createClient().post('/api/v2/measurements/export', { group_by: 'team' }, { file_format: 'csv' });

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('https://api.example.test/api/v2/measurements/export?file_format=csv');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"group_by":"team"}');
  });

  it('returns the success object for 204', async () => {
    mockFetch.mockResolvedValue(new Response(null, { status: 204 }));
    expect(await createClient().get('/api/v1/health')).toEqual(EMPTY_RESPONSE_RESULT);
  });

  it('returns the success object for an empty 200 body', async () => {
    mockFetch.mockResolvedValue(new Response('', { status: 200 }));
    expect(await createClient().get('/api/v1/health')).toEqual({
      status: 'success',
      message: 'Operation completed successfully',
    });
  });

  it('throws UpstreamError with status and body for non-2xx', async () => {
    mockFetch.mockResolvedValue(new Response('{"detail":"forbidden"}', { status: 403 }));

    const error = await createClient()
      .get('/api/v1/users')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    if (!(error instanceof UpstreamError)) return;
    expect(error.message).toBe('API request failed with status 403: {"detail":"forbidden"}');
    expect(error.toPayload()).toEqual({
      error: 'API request failed with status 403: {"detail":"forbidden"}',
      code: 'upstream_failure',
      status_code: 403,
      response_body: '{"detail":"forbidden"}',
    });
  });

  it('maps transport failures to network errors', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    await expect(createClient().get('/api/v1/health')).rejects.toThrow('Network error: fetch failed');
  });

  it('rejects a 2xx body that is not JSON', async () => {
    mockFetch.mockResolvedValue(new Response('id,value\n1,2', { status: 200 }));

    await expect(createClient().get('/api/v1/health')).rejects.toThrow(
      'Unexpected error: response is not valid JSON (status 200)'
    );
  });

  it('times out a request that never answers', async () => {
    const client = createClient(hangingFetch(), 20);

    await expect(client.get('/api/v1/health')).rejects.toThrow('Network error: request timed out after 20ms');
  });

  describe('close', () => {
    it('aborts in-flight requests', async () => {
      const client = createClient(hangingFetch());
      const pending = client.get('/api/v1/health');

      client.close();

      await expect(pending).rejects.toThrow('Network error: request aborted because the client was closed');
    });

    it('rejects calls after close without sending them', async () => {
      const client = createClient();
      client.close();

      await expect(client.get('/api/v1/health')).rejects.toThrow(
        'HTTP client is closed; GET /api/v1/health was not sent'
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('is idempotent', () => {
      const client = createClient();
      client.close();
      client.close();
      expect(client.isClosed).toBe(true);
    });
  });
});

describe('buildUrl', () => {
  it('omits the query string when every value is unset', () => {
    expect(buildUrl('https://api.example.test', '/api/v1/health', { stage: undefined })).toBe(
      'https://api.example.test/api/v1/health'
    );
  });

  it('encodes values', () => {
    expect(buildUrl('https://api.example.test', '/api/v2/teams', { search_term: 'a&b c' })).toBe(
      'https://api.example.test/api/v2/teams?search_term=a%26b+c'
    );
  });
});
