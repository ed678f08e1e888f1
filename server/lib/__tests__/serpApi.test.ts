import { describe, it, expect, vi } from 'vitest';
import { ErrorCode } from '@shared/errors';
import { SerpApiClient } from '../serpApi';

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createClient(fetchImpl: typeof fetch, apiKey: string | undefined = 'test-key') {
  return new SerpApiClient({
    apiKey,
    baseUrl: 'https://serpapi.test/search',
    timeoutMs: 1000,
    fetchImpl,
  });
}

describe('SerpApiClient', () => {
  it('sends the engine, parameters and key as query string', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({ properties: [] }));
    const client = createClient(fetchImpl);

    const data = await client.search('google_hotels', { q: 'Lisbon, Portugal', hl: 'en' });

    expect(data).toEqual({ properties: [] });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const url = new URL(String(fetchImpl.mock.calls[0]?.[0]));
    expect(url.origin + url.pathname).toBe('https://serpapi.test/search');
    expect(url.searchParams.get('engine')).toBe('google_hotels');
    expect(url.searchParams.get('q')).toBe('Lisbon, Portugal');
    expect(url.searchParams.get('hl')).toBe('en');
    expect(url.searchParams.get('api_key')).toBe('test-key');
    expect(fetchImpl.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it('rejects on a non-2xx status', async () => {
    const client = createClient(async () => jsonResponse({}, 503));

    await expect(client.search('google', { q: 'airbnb Rome' }))
      .rejects.toMatchObject({ code: ErrorCode.UPSTREAM_ERROR, message: 'SerpApi google failed: 503' });
  });

  it('rejects when the payload reports an error', async () => {
    const client = createClient(async () => jsonResponse({ error: 'Invalid API key.' }));

    await expect(client.search('google_flights', { departure_id: 'LHR' }))
      .rejects.toMatchObject({ code: ErrorCode.UPSTREAM_ERROR, message: 'SerpApi google_flights error: Invalid API key.' });
  });

  it('refuses to call out without a key', async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({}));
    const client = createClient(fetchImpl, undefined);

    expect(client.configured).toBe(false);
    await expect(client.search('google', { q: 'x' }))
      .rejects.toMatchObject({ code: ErrorCode.UPSTREAM_NOT_CONFIGURED });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
