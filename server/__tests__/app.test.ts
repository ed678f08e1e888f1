import { once } from 'events';
import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { ErrorCode } from '@shared/errors';
import { createApp } from '../app';
import { loadConfig } from '../config';
import {
  createFakeGenerator,
  createFakeSearch,
  flightsPayload,
  sampleItinerary,
  type SearchCall,
} from '../testing/fakes';

interface TestServer {
  server: Server;
  baseUrl: string;
  calls: SearchCall[];
}

type SearchHandlers = Parameters<typeof createFakeSearch>[0];

const defaultHandlers: SearchHandlers = {
  google_flights: () => flightsPayload([180, 200]),
  google_hotels: () => ({
    properties: [{ name: 'Hotel Mar', rate_per_night: { extracted_lowest: 120 } }],
  }),
  google: () => ({
    organic_results: [{ title: 'Loft in Gracia', link: 'https://www.airbnb.com/rooms/1' }],
  }),
};

async function startApp(env: NodeJS.ProcessEnv = {}, handlers = defaultHandlers): Promise<TestServer> {
  const { provider, calls } = createFakeSearch(handlers);
  const { generator } = createFakeGenerator(() => JSON.stringify(sampleItinerary(5)));
  const app = createApp({
    config: loadConfig({ NODE_ENV: 'test', ...env }),
    search: provider,
    generator,
  });

  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server did not bind a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}`, calls };
}

async function stopApp({ server }: TestServer) {
  await new Promise<void>((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

function postJson(baseUrl: string, path: string, body: unknown, signal?: AbortSignal) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    signal,
  });
}

const validTrip = {
  origin: 'LHR',
  destination: 'BCN',
  outbound_date: '2025-03-01',
  budget: 900,
};

describe('HTTP API', () => {
  let ctx: TestServer;

  beforeAll(async () => {
    ctx = await startApp();
  });

  afterAll(async () => {
    await stopApp(ctx);
  });

  it('reports health and provider configuration', async () => {
    const res = await fetch(`${ctx.baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', providers: { search: true, generation: true } });
  });

  it('rejects a request without a destination before any upstream call', async () => {
    const before = ctx.calls.length;
    const { destination: _destination, ...body } = validTrip;

    const res = await postJson(ctx.baseUrl, '/api/itinerary', body);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      errorCode: ErrorCode.MISSING_REQUIRED_FIELD,
      error: 'Missing required fields',
      fields: ['destination'],
    });
    expect(ctx.calls.length).toBe(before);
  });

  it('treats blank required fields as missing', async () => {
    const res = await postJson(ctx.baseUrl, '/api/itinerary', { ...validTrip, origin: '  ', outbound_date: null });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ fields: ['origin', 'outbound_date'] });
  });

  it('plans a trip whose return date precedes departure, without rentals', async () => {
    const res = await postJson(ctx.baseUrl, '/api/itinerary', {
      ...validTrip,
      return_date: '2025-02-27',
      accommodation_type: 'mixed',
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      trip_duration: -2,
      return_date: '2025-02-27',
      recommended_flight_cost: 180,
      hotel_options: [{ name: 'Hotel Mar' }],
      airbnb_options: [],
      itinerary: sampleItinerary(5),
    });
  });

  it('rejects an unknown accommodation type', async () => {
    const res = await postJson(ctx.baseUrl, '/api/itinerary', { ...validTrip, accommodation_type: 'castle' });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ errorCode: ErrorCode.VALIDATION_ERROR });
  });

  it('plans a mixed-lodging trip', async () => {
    const res = await postJson(ctx.baseUrl, '/api/itinerary', {
      ...validTrip,
      origin: 'lhr',
      keywords: ['food'],
      accommodation_type: 'mixed',
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      destination: 'Barcelona, Spain',
      destination_code: 'BCN',
      origin: 'LHR',
      keywords: ['food'],
      total_budget: 900,
      trip_duration: 5,
      outbound_date: '2025-03-01',
      return_date: '2025-03-06',
      recommended_flight_cost: 180,
      remaining_budget: 720,
      accommodation_type: 'mixed',
      hotel_options: [{ type: 'hotel', name: 'Hotel Mar', price_per_night: 120 }],
      airbnb_options: [{ type: 'airbnb', name: 'Loft in Gracia', total_price: '375' }],
      itinerary: sampleItinerary(5),
    });
  });

  it('answers unknown API paths with JSON 404', async () => {
    const res = await fetch(`${ctx.baseUrl}/api/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      errorCode: ErrorCode.NOT_FOUND,
      error: 'API endpoint not found',
      path: '/api/nope',
    });
  });

  it('returns 400 for a malformed JSON body', async () => {
    const res = await fetch(`${ctx.baseUrl}/api/itinerary`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"origin": ',
    });

    expect(res.status).toBe(400);
  });

  it('serves the landing page', async () => {
    const res = await fetch(`${ctx.baseUrl}/`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toContain('text/html');
    expect(await res.text()).toContain('<title>Trip Planner</title>');
  });
});

describe('client disconnect', () => {
  it('aborts in-flight upstream searches when the client goes away', async () => {
    let markStarted = () => {};
    const searchStarted = new Promise<void>(resolve => {
      markStarted = () => resolve();
    });
    let markAborted = (_reason: unknown) => {};
    const upstreamAborted = new Promise<unknown>(resolve => {
      markAborted = reason => resolve(reason);
    });

    const ctx = await startApp({}, {
      google_flights: (_params, options) => new Promise((_resolve, reject) => {
        markStarted();
        const signal = options.signal;
        if (!signal) return;
        signal.addEventListener('abort', () => {
          markAborted(signal.reason);
          reject(signal.reason);
        }, { once: true });
      }),
    });

    try {
      const client = new AbortController();
      const pending = postJson(ctx.baseUrl, '/api/itinerary', validTrip, client.signal);

      await searchStarted;
      client.abort();

      await expect(pending).rejects.toThrow();
      const reason = await upstreamAborted;
      expect(reason instanceof Error && reason.name).toBe('AbortError');
    } finally {
      await stopApp(ctx);
    }
  });
});

describe('plan rate limit', () => {
  let ctx: TestServer;

  beforeAll(async () => {
    ctx = await startApp({ PLAN_RATE_LIMIT_PER_MINUTE: '1' });
  });

  afterAll(async () => {
    await stopApp(ctx);
  });

  it('returns 429 once the per-minute allowance is spent', async () => {
    const first = await postJson(ctx.baseUrl, '/api/itinerary', {});
    const second = await postJson(ctx.baseUrl, '/api/itinerary', {});

    expect(first.status).toBe(400);
    expect(second.status).toBe(429);
    expect(await second.json()).toEqual({
      errorCode: ErrorCode.RATE_LIMITED,
      error: 'Too many trip plans requested, please try again later',
      retryAfter: 60,
    });
  });
});
