import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer, VERSION } from '../src/app.js';
import { createBrainRuntime } from '../src/runtime.js';
import { parseConfig } from '../src/config/index.js';
import { MemoryCacheStore } from '../src/cache/index.js';
import { PermanentRemoteError } from '../src/errors.js';
import { FakeTransport, type ReplyHandler } from './helpers.js';

const ADVICE_HANDLER: ReplyHandler = async () => ({ response: 'Happy to help with your budget.' });

describe('HTTP API', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function start(handler: ReplyHandler = ADVICE_HANDLER, raw: Record<string, unknown> = {}) {
    const transport = new FakeTransport(handler);
    const runtime = createBrainRuntime(parseConfig(raw), {
      transport,
      store: new MemoryCacheStore(),
      sleep: async () => undefined,
      random: () => 1
    });
    const server = await buildServer(runtime);
    app = server;
    return { app: server, transport, runtime };
  }

  it('reports health', async () => {
    const { app } = await start();

    const response = await app.inject({ method: 'GET', url: '/api/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'healthy',
      version: VERSION,
      remote_reachable: true,
      breaker: 'closed',
      gate: { capacity: 3, active: 0, waiting: 0, totalProcessed: 0, timeouts: 0 }
    });
  });

  it('reports degraded health when the remote is unreachable', async () => {
    const { app, transport } = await start();
    transport.healthy = false;

    const response = await app.inject({ method: 'GET', url: '/api/health' });

    expect(response.json()).toMatchObject({ status: 'degraded', remote_reachable: false });
  });

  it('categorizes a transaction and echoes the request id', async () => {
    const { app, transport } = await start();

    const response = await app.inject({
      method: 'POST',
      url: '/api/categorize',
      headers: { 'x-request-id': 'req-123' },
      payload: { description: 'STARBUCKS #1234' }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      request_id: 'req-123',
      description: 'STARBUCKS #1234',
      category: 'Coffee & Beverages',
      source: 'fast',
      disclaimer: true,
      degraded: false
    });
    expect(transport.calls).toHaveLength(0);
  });

  it('rejects a categorize body without a description', async () => {
    const { app } = await start();

    const response = await app.inject({ method: 'POST', url: '/api/categorize', payload: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'invalid_request', details: ['description: Required'] });
  });

  it('answers a direct query', async () => {
    const { app, transport } = await start();

    const response = await app.inject({
      method: 'POST',
      url: '/api/query',
      payload: { mode: 'chat', query: 'hello', context: { income: 4200 } }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      degraded: false,
      fromCache: false,
      result: { mode: 'chat', text: 'Happy to help with your budget.', source: 'remote' }
    });
    expect(transport.calls).toEqual([{ mode: 'chat', query: 'hello', context: { income: 4200 } }]);
  });

  it('rejects an unknown query mode', async () => {
    const { app } = await start();

    const response = await app.inject({
      method: 'POST',
      url: '/api/query',
      payload: { mode: 'summarize', query: 'hello' }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'invalid_request' });
  });

  it('records feedback and reports consensus once reached', async () => {
    const { app } = await start();
    const payload = { original_category: 'Other', corrected_category: 'grocery', description: 'WHOLEFDS MKT #10234' };

    const first = await app.inject({ method: 'POST', url: '/api/feedback', payload });
    expect(first.statusCode).toBe(202);
    expect(first.json()).toMatchObject({ accepted: true, consensus_category: null });

    await app.inject({ method: 'POST', url: '/api/feedback', payload });
    const third = await app.inject({ method: 'POST', url: '/api/feedback', payload });
    expect(third.json()).toMatchObject({ accepted: true, consensus_category: 'Groceries' });
  });

  it('refuses feedback naming an unknown category', async () => {
    const { app } = await start();

    const response = await app.inject({
      method: 'POST',
      url: '/api/feedback',
      payload: { original_category: 'Other', corrected_category: 'Snacks', description: 'CORNER DELI' }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'unknown_category', details: ['"Snacks" is not a known category'] });
  });

  it('exposes resilience state and resets the breaker', async () => {
    const { app } = await start(
      async () => {
        throw new PermanentRemoteError(404, 'Remote service rejected request: 404');
      },
      { breaker: { failure_threshold: 1 } }
    );

    const categorized = await app.inject({
      method: 'POST',
      url: '/api/categorize',
      payload: { description: 'ACME WIDGETS LLC' }
    });
    expect(categorized.json()).toMatchObject({ source: 'fallback', degraded: true, reason: 'remote_error' });

    const state = await app.inject({ method: 'GET', url: '/api/resilience' });
    expect(state.json()).toMatchObject({
      breaker: { phase: 'open', totalFailures: 1 },
      gate: { active: 0 },
      feedback: { totalCorrections: 0 }
    });

    const reset = await app.inject({ method: 'POST', url: '/api/resilience/reset' });
    expect(reset.json()).toMatchObject({ reset: true, breaker: { phase: 'closed', consecutiveFailures: 0 } });
  });

  it('serves metrics in the Prometheus text format', async () => {
    const { app } = await start();
    await app.inject({ method: 'POST', url: '/api/categorize', payload: { description: 'STARBUCKS #1234' } });

    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/plain; version=0.0.4; charset=utf-8');
    const lines = response.body.split('\n');
    expect(lines).toContain('brain_categorizations_total{source="fast"} 1');
    expect(lines).toContain('brain_circuit_state 0');
  });
});
