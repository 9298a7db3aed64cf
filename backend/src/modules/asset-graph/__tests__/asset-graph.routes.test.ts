/**
 * Asset Graph API Tests
 *
 * In-process requests through Fastify's inject; no network.
 */

import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildApp } from '../../../app.js';
import { createGraphContext, silentLogger } from '../context/graph.context.js';
import type { GraphContext } from '../context/graph.context.js';
import { currency, equity, event } from './fixtures.js';

const SAMPLE_PATH = 'backend/data/sample-universe.json';

describe('Asset Graph API', () => {
  let app: FastifyInstance;
  let ctx: GraphContext;

  beforeEach(async () => {
    ctx = createGraphContext({ logger: silentLogger, settings: { loadSample: false, topN: 5 } });
    app = buildApp({ logger: false, context: ctx });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function seedTech(): Promise<void> {
    for (const payload of [equity('AAPL', 'Tech'), equity('MSFT', 'Tech')]) {
      const res = await app.inject({ method: 'POST', url: '/api/graph/assets', payload });
      expect(res.statusCode).toBe(201);
    }
  }

  describe('health', () => {

    it('reports the graph revision', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ ok: true, service: 'asset-graph', revision: 0 });
    });
  });

  describe('assets', () => {

    it('creates assets and reports discovered relationships', async () => {
      const first = await app.inject({ method: 'POST', url: '/api/graph/assets', payload: equity('AAPL', 'Tech') });
      const second = await app.inject({ method: 'POST', url: '/api/graph/assets', payload: equity('MSFT', 'Tech') });

      expect(first.json()).toEqual({ ok: true, id: 'AAPL', created: 0 });
      expect(second.json()).toEqual({ ok: true, id: 'MSFT', created: 1 });
      expect(ctx.graph.size.relationships).toBe(1);
    });

    it('lists assets filtered by class', async () => {
      await seedTech();
      await app.inject({ method: 'POST', url: '/api/graph/assets', payload: currency('EURUSD', 'EUR', 'USD') });

      const all = await app.inject({ method: 'GET', url: '/api/graph/assets' });
      expect(all.json().count).toBe(3);

      const fx = await app.inject({ method: 'GET', url: '/api/graph/assets?assetClass=CURRENCY' });
      expect(fx.json().assets.map((a: { id: string }) => a.id)).toEqual(['EURUSD']);
    });

    it('returns an asset with its relationships and neighbors', async () => {
      await seedTech();

      const asset = await app.inject({ method: 'GET', url: '/api/graph/assets/AAPL' });
      expect(asset.json().asset.sector).toBe('Tech');

      const rels = await app.inject({ method: 'GET', url: '/api/graph/assets/AAPL/relationships' });
      expect(rels.json()).toEqual({
        ok: true,
        id: 'AAPL',
        count: 1,
        neighbors: ['MSFT'],
        relationships: [
          { source: 'AAPL', target: 'MSFT', kind: 'sector_affinity', bidirectional: true, weight: 0.7 },
        ],
      });
    });

    it('deletes an asset with its relationships', async () => {
      await seedTech();

      const res = await app.inject({ method: 'DELETE', url: '/api/graph/assets/AAPL' });
      expect(res.json()).toEqual({ ok: true, id: 'AAPL', removed: 1 });
      expect(ctx.graph.size).toEqual({ assets: 1, events: 0, relationships: 0 });
    });
  });

  describe('errors', () => {

    it('answers 409 for a duplicate id', async () => {
      await seedTech();
      const res = await app.inject({ method: 'POST', url: '/api/graph/assets', payload: equity('AAPL', 'Tech') });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toMatchObject({ ok: false, error: 'DUPLICATE_ID' });
    });

    it('answers 404 for an unknown asset', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/graph/assets/NOPE' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toMatchObject({ ok: false, error: 'NOT_FOUND', message: 'Unknown asset "NOPE"' });
    });

    it('answers 400 INVALID_ATTRIBUTE for an invalid asset body', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/graph/assets',
        payload: currency('USDUSD', 'USD', 'USD'),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'INVALID_ATTRIBUTE',
        message: 'Invalid asset: quoteCurrency: must differ from baseCurrency',
        details: { issues: ['quoteCurrency: must differ from baseCurrency'] },
      });
      expect(ctx.graph.hasNode('USDUSD')).toBe(false);
    });

    it('answers 400 INVALID_ATTRIBUTE for an invalid event body', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/graph/events', payload: event('EVT-X', 1.5) });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({
        ok: false,
        error: 'INVALID_ATTRIBUTE',
        message: 'Invalid regulatory event: impactScore: Number must be less than or equal to 1',
      });
      expect(ctx.graph.size.events).toBe(0);
    });

    it('answers 400 for an invalid query', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/graph/relationships/top?n=0' });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');
    });

    it('answers 404 for unknown routes', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/graph/nothing-here' });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
    });
  });

  describe('events', () => {

    it('creates, lists and deletes events', async () => {
      await seedTech();

      const created = await app.inject({
        method: 'POST',
        url: '/api/graph/events',
        payload: event('EVT-1', -0.5, { assetId: 'AAPL' }),
      });
      expect(created.statusCode).toBe(201);
      expect(created.json()).toEqual({ ok: true, id: 'EVT-1', created: 1 });

      const list = await app.inject({ method: 'GET', url: '/api/graph/events' });
      expect(list.json().count).toBe(1);

      const removed = await app.inject({ method: 'DELETE', url: '/api/graph/events/EVT-1' });
      expect(removed.json()).toEqual({ ok: true, id: 'EVT-1', removed: 1 });
    });
  });

  describe('views', () => {

    beforeEach(async () => {
      await seedTech();
      await app.inject({
        method: 'POST',
        url: '/api/graph/events',
        payload: event('EVT-1', 0.2, { assetId: 'MSFT' }),
      });
    });

    it('filters relationships by kind', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/graph/relationships?kind=regulatory_impact' });
      expect(res.json().relationships).toEqual([
        { source: 'EVT-1', target: 'MSFT', kind: 'regulatory_impact', bidirectional: false, weight: 0.2 },
      ]);
    });

    it('returns the strongest relationships', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/graph/relationships/top?n=1' });
      expect(res.json().n).toBe(1);
      expect(res.json().relationships.map((r: { kind: string }) => r.kind)).toEqual(['sector_affinity']);

      const byDefault = await app.inject({ method: 'GET', url: '/api/graph/relationships/top' });
      expect(byDefault.json().n).toBe(5);
    });

    it('returns metrics', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/graph/metrics' });
      const { metrics } = res.json();

      expect(metrics.totalAssets).toBe(2);
      expect(metrics.totalEvents).toBe(1);
      expect(metrics.totalRelationships).toBe(2);
      expect(metrics.density).toBeCloseTo(2 / 3, 10);
    });

    it('returns a seeded layout', async () => {
      const a = await app.inject({ method: 'GET', url: '/api/graph/layout?seed=demo' });
      const b = await app.inject({ method: 'GET', url: '/api/graph/layout?seed=demo' });

      expect(a.json().seed).toBe('demo');
      expect(a.json().nodes.map((n: { id: string }) => n.id)).toEqual(['AAPL', 'EVT-1', 'MSFT']);
      expect(a.json().edges).toHaveLength(2);
      expect(b.json()).toEqual(a.json());
    });

    it('returns the markdown report', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/graph/report' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('text/markdown; charset=utf-8');
      expect(res.body.split('\n')[0]).toBe('# Asset Relationship Schema Report');
    });
  });
});

describe('Asset Graph API with sample universe', () => {
  let app: FastifyInstance;
  let ctx: GraphContext;

  beforeEach(async () => {
    ctx = createGraphContext({ logger: silentLogger, settings: { loadSample: true, samplePath: SAMPLE_PATH } });
    app = buildApp({ logger: false, context: ctx });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('loads the sample universe on startup', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/graph/assets' });
    expect(res.json().count).toBe(17);
    expect(ctx.graph.size.events).toBe(4);
  });

  it('reloads the sample universe on demand', async () => {
    ctx.graph.removeAsset('AAPL');
    const res = await app.inject({ method: 'POST', url: '/api/graph/reload' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, assets: 17, events: 4 });
    expect(ctx.graph.hasNode('AAPL')).toBe(true);
  });
});
