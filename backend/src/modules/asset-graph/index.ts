/**
 * ASSET GRAPH MODULE INDEX
 * ========================
 *
 * Relationship graph engine for the asset explorer:
 * - Asset / event model and validation
 * - Rule-based relationship discovery
 * - Deterministic 3D layout
 * - Metrics, schema report and HTTP API
 */

import type { FastifyInstance } from 'fastify';
import fs from 'fs';
import { registerAssetGraphRoutes } from './api/asset-graph.routes.js';
import type { GraphContext } from './context/graph.context.js';
import { loadUniverseFile } from './services/universe.loader.js';

// ═══════════════════════════════════════════════════════════════
// COLD START: load the sample universe if configured
// ═══════════════════════════════════════════════════════════════

function coldStartUniverse(ctx: GraphContext): void {
  const { settings, logger, graph } = ctx;
  if (!settings.loadSample) {
    logger.info('Cold Start: sample universe disabled');
    return;
  }
  if (!fs.existsSync(settings.samplePath)) {
    logger.warn('Cold Start: sample universe not found', { path: settings.samplePath });
    return;
  }
  const result = loadUniverseFile(graph, settings.samplePath, logger);
  logger.info('Cold Start: graph ready', { ...result, revision: graph.revision });
}

// ═══════════════════════════════════════════════════════════════
// REGISTER
// ═══════════════════════════════════════════════════════════════

export async function registerAssetGraphModule(fastify: FastifyInstance, ctx: GraphContext): Promise<void> {
  coldStartUniverse(ctx);
  await registerAssetGraphRoutes(fastify, ctx);
  ctx.logger.info('Asset graph module registered at /api/graph/*');
}

// Contracts
export * from './contracts/asset-graph.types.js';
export * from './contracts/asset-graph.schemas.js';
export * from './contracts/asset-graph.errors.js';
export * from './asset-graph.config.js';

// Services
export * from './context/graph.context.js';
export * from './rules/relationship.rules.js';
export * from './services/asset-graph.service.js';
export * from './services/layout.generator.js';
export * from './services/metrics.engine.js';
export * from './services/schema.report.js';
export * from './services/universe.loader.js';

export { registerAssetGraphRoutes } from './api/asset-graph.routes.js';
