/**
 * ASSET GRAPH API ROUTES
 * ======================
 *
 * /api/graph/*: asset universe, relationships, layout and metrics
 *
 * Thin layer: bodies and query strings are validated with zod,
 * graph errors bubble up to the global error handler.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ASSET_CLASSES, AssetSchema, RegulatoryEventSchema } from '../contracts/asset-graph.schemas.js';
import { RELATIONSHIP_KINDS } from '../contracts/asset-graph.types.js';
import { InvalidAttributeError } from '../contracts/asset-graph.errors.js';
import type { GraphContext } from '../context/graph.context.js';
import { generateLayout } from '../services/layout.generator.js';
import { topRelationships } from '../services/metrics.engine.js';
import { generateSchemaReport } from '../services/schema.report.js';
import { loadUniverseFile } from '../services/universe.loader.js';

type IdParams = { Params: { id: string } };

const AssetListQuery = z.object({
  assetClass: z.enum(ASSET_CLASSES).optional(),
});

const RelationshipListQuery = z.object({
  kind: z.enum(RELATIONSHIP_KINDS).optional(),
});

const TopQuery = z.object({
  n: z.coerce.number().int().min(1).max(100).optional(),
});

const LayoutQuery = z.object({
  seed: z.string().trim().min(1).max(64).optional(),
});

/** Body validation raises the same error kind the graph does */
function parseBody<T extends z.ZodTypeAny>(schema: T, subject: string, body: unknown): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw InvalidAttributeError.fromZod(subject, result.error);
  }
  return result.data;
}

export async function registerAssetGraphRoutes(app: FastifyInstance, ctx: GraphContext): Promise<void> {
  const { graph } = ctx;

  // ═══════════════════════════════════════════════════════════════
  // ASSETS
  // ═══════════════════════════════════════════════════════════════

  /**
   * GET /api/graph/assets
   * Optional ?assetClass= filter
   */
  app.get('/api/graph/assets', async (request: FastifyRequest, reply: FastifyReply) => {
    const { assetClass } = AssetListQuery.parse(request.query);
    const assets = graph.allAssets().filter((a) => !assetClass || a.assetClass === assetClass);
    return reply.send({ ok: true, count: assets.length, assets });
  });

  app.get('/api/graph/assets/:id', async (request: FastifyRequest<IdParams>, reply: FastifyReply) => {
    return reply.send({ ok: true, asset: graph.getAsset(request.params.id) });
  });

  /**
   * GET /api/graph/assets/:id/relationships
   * Every edge touching the node, sorted by (kind, other endpoint)
   */
  app.get('/api/graph/assets/:id/relationships', async (request: FastifyRequest<IdParams>, reply: FastifyReply) => {
    const { id } = request.params;
    const relationships = graph.getRelationships(id);
    return reply.send({
      ok: true,
      id,
      count: relationships.length,
      neighbors: graph.getNeighbors(id),
      relationships,
    });
  });

  app.post('/api/graph/assets', async (request: FastifyRequest, reply: FastifyReply) => {
    const asset = parseBody(AssetSchema, 'asset', request.body);
    const created = graph.addAsset(asset);
    return reply.status(201).send({ ok: true, id: asset.id, created });
  });

  app.delete('/api/graph/assets/:id', async (request: FastifyRequest<IdParams>, reply: FastifyReply) => {
    const { id } = request.params;
    const removed = graph.removeAsset(id);
    return reply.send({ ok: true, id, removed });
  });

  // ═══════════════════════════════════════════════════════════════
  // REGULATORY EVENTS
  // ═══════════════════════════════════════════════════════════════

  app.get('/api/graph/events', async (_request: FastifyRequest, reply: FastifyReply) => {
    const events = graph.allEvents();
    return reply.send({ ok: true, count: events.length, events });
  });

  app.post('/api/graph/events', async (request: FastifyRequest, reply: FastifyReply) => {
    const event = parseBody(RegulatoryEventSchema, 'regulatory event', request.body);
    const created = graph.addEvent(event);
    return reply.status(201).send({ ok: true, id: event.id, created });
  });

  app.delete('/api/graph/events/:id', async (request: FastifyRequest<IdParams>, reply: FastifyReply) => {
    const { id } = request.params;
    const removed = graph.removeEvent(id);
    return reply.send({ ok: true, id, removed });
  });

  // ═══════════════════════════════════════════════════════════════
  // RELATIONSHIPS
  // ═══════════════════════════════════════════════════════════════

  app.get('/api/graph/relationships', async (request: FastifyRequest, reply: FastifyReply) => {
    const { kind } = RelationshipListQuery.parse(request.query);
    const relationships = graph.allRelationships().filter((rel) => !kind || rel.kind === kind);
    return reply.send({ ok: true, count: relationships.length, relationships });
  });

  /**
   * GET /api/graph/relationships/top?n=10
   * Strongest links, ties broken by (source, target, kind)
   */
  app.get('/api/graph/relationships/top', async (request: FastifyRequest, reply: FastifyReply) => {
    const { n } = TopQuery.parse(request.query);
    const limit = n ?? ctx.settings.topN;
    const relationships = topRelationships(graph.allRelationships(), limit);
    return reply.send({ ok: true, n: limit, relationships });
  });

  // ═══════════════════════════════════════════════════════════════
  // VIEWS
  // ═══════════════════════════════════════════════════════════════

  app.get('/api/graph/metrics', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ ok: true, metrics: ctx.metrics.get(graph, ctx.settings.topN) });
  });

  /**
   * GET /api/graph/layout?seed=
   * Same seed + same node set → same coordinates
   */
  app.get('/api/graph/layout', async (request: FastifyRequest, reply: FastifyReply) => {
    const { seed } = LayoutQuery.parse(request.query);
    const layout = generateLayout(graph.snapshot(), { seed: seed ?? ctx.settings.layoutSeed });
    return reply.send({ ok: true, ...layout });
  });

  app.get('/api/graph/report', async (_request: FastifyRequest, reply: FastifyReply) => {
    const report = generateSchemaReport(graph, ctx.settings.topN);
    return reply.type('text/markdown; charset=utf-8').send(report);
  });

  // ═══════════════════════════════════════════════════════════════
  // ADMIN
  // ═══════════════════════════════════════════════════════════════

  app.post('/api/graph/reload', async (_request: FastifyRequest, reply: FastifyReply) => {
    const result = loadUniverseFile(graph, ctx.settings.samplePath, ctx.logger);
    return reply.send({ ok: true, ...result, revision: graph.revision });
  });
}
