import { afterEach, describe, expect, it, vi } from 'vitest';

import { createSyncTransportHttp } from './syncTransport.http';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => {
    if (response instanceof Error) throw response;
    return response;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('createSyncTransportHttp', () => {
  it('starts a session with the client id and bearer token', async () => {
    const fetchMock = stubFetch(jsonResponse(200, { session_id: 'sync-abc', default_limit: 50 }));
    const transport = createSyncTransportHttp({ baseUrl: 'https://sync.test', clientId: 'device-1', token: 'test-token' });

    const res = await transport.startSession(50);

    expect(res).toEqual({ ok: true, value: { session_id: 'sync-abc', default_limit: 50 } });
    expect(fetchMock).toHaveBeenCalledWith('https://sync.test/api/sync/sessions', {
      method: 'POST',
      body: '{"limit":50}',
      headers: {
        'Content-Type': 'application/json',
        'X-Sync-Client-Id': 'device-1',
        'Authorization': 'Bearer test-token',
      },
    });
  });

  it('puts the delta cursor in the query string', async () => {
    const fetchMock = stubFetch(jsonResponse(200, { created: [] }));
    const transport = createSyncTransportHttp();

    await transport.getDelta('sync-abc', 17, 100);

    expect(fetchMock.mock.calls[0]?.[0]).toBe('/api/sync/delta?session_id=sync-abc&since=17&limit=100');
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('GET');
  });

  it('omits an unset page limit', async () => {
    const fetchMock = stubFetch(jsonResponse(200, { items: [] }));

    await createSyncTransportHttp().getFull('sync-abc');

    expect(fetchMock.mock.calls[0]?.[0]).toBe('/api/sync/full?session_id=sync-abc');
  });

  it('posts apply batches with the session id', async () => {
    const fetchMock = stubFetch(jsonResponse(200, { results: [] }));

    await createSyncTransportHttp().apply('sync-abc', [
      { entity_type: 'summary', id: 3, action: 'delete', last_seen_version: 9 },
    ]);

    expect(fetchMock.mock.calls[0]?.[1]?.body)
      .toBe('{"session_id":"sync-abc","changes":[{"entity_type":"summary","id":3,"action":"delete","last_seen_version":9}]}');
  });

  it('surfaces the server error code', async () => {
    stubFetch(jsonResponse(410, { error: 'session_expired', session_id: 'sync-abc' }));

    const res = await createSyncTransportHttp().getFull('sync-abc');

    expect(res).toEqual({
      ok: false,
      error: 'session_expired',
      status: 410,
      retryable: false,
      body: { error: 'session_expired', session_id: 'sync-abc' },
    });
  });

  it('marks rate limiting as retryable', async () => {
    stubFetch(jsonResponse(429, { error: 'rate_limited' }));

    const res = await createSyncTransportHttp().apply('sync-abc', []);

    expect(res).toMatchObject({ ok: false, error: 'rate_limited', status: 429, retryable: true });
  });

  it('falls back to the status line for non-JSON errors', async () => {
    stubFetch(new Response('', { status: 502, statusText: 'Bad Gateway' }));

    const res = await createSyncTransportHttp().startSession();

    expect(res).toEqual({ ok: false, error: 'http 502 Bad Gateway', status: 502, retryable: true, body: null });
  });

  it('reports network failures as retryable', async () => {
    stubFetch(new TypeError('fetch failed'));

    const res = await createSyncTransportHttp().startSession();

    expect(res).toEqual({ ok: false, error: 'fetch failed', retryable: true });
  });
});
