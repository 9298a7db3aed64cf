/**
 * GRAPH CONTEXT
 * =============
 *
 * Explicit dependency object for the asset graph module.
 * Built once at boot and handed to routes, loaders and reports;
 * nothing in the module reads process.env directly.
 */

import type { FastifyBaseLogger } from 'fastify';
import { env } from '../../../config/env.js';
import { DEFAULT_TOP_N } from '../asset-graph.config.js';
import type { RelationshipRuleOverrides } from '../asset-graph.config.js';
import { AssetRelationshipGraph } from '../services/asset-graph.service.js';
import { MetricsCache } from '../services/metrics.engine.js';

// ═══════════════════════════════════════════════════════════════
// CORE INTERFACES
// ═══════════════════════════════════════════════════════════════

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug?: (msg: string, meta?: LogMeta) => void;
}

export interface GraphSettings {
  layoutSeed: number;
  topN: number;
  loadSample: boolean;
  samplePath: string;
}

export interface GraphContext {
  graph: AssetRelationshipGraph;
  metrics: MetricsCache;
  logger: Logger;
  settings: GraphSettings;
}

// ═══════════════════════════════════════════════════════════════
// DEFAULT IMPLEMENTATIONS
// ═══════════════════════════════════════════════════════════════

export const defaultLogger: Logger = {
  info: (msg, meta) => console.log(`[AssetGraph] ${msg}`, meta ?? ''),
  warn: (msg, meta) => console.warn(`[AssetGraph] ${msg}`, meta ?? ''),
  error: (msg, meta) => console.error(`[AssetGraph] ${msg}`, meta ?? ''),
  debug: (msg, meta) => console.debug(`[AssetGraph] ${msg}`, meta ?? ''),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** Route module logs into Fastify's pino instance */
export function fromFastifyLogger(log: FastifyBaseLogger): Logger {
  const child = log.child({ module: 'asset-graph' });
  return {
    info: (msg, meta) => child.info(meta ?? {}, msg),
    warn: (msg, meta) => child.warn(meta ?? {}, msg),
    error: (msg, meta) => child.error(meta ?? {}, msg),
    debug: (msg, meta) => child.debug(meta ?? {}, msg),
  };
}

export const settingsFromEnv = (): GraphSettings => ({
  layoutSeed: env.GRAPH_LAYOUT_SEED,
  topN: env.GRAPH_TOP_N,
  loadSample: env.GRAPH_LOAD_SAMPLE,
  samplePath: env.GRAPH_SAMPLE_PATH,
});

// ═══════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════

export interface GraphContextOptions {
  logger?: Logger;
  settings?: Partial<GraphSettings>;
  rules?: RelationshipRuleOverrides;
  graph?: AssetRelationshipGraph;
}

export function createGraphContext(options: GraphContextOptions = {}): GraphContext {
  const logger = options.logger ?? defaultLogger;
  const settings: GraphSettings = {
    ...settingsFromEnv(),
    ...options.settings,
  };
  if (!Number.isInteger(settings.topN) || settings.topN < 1) {
    settings.topN = DEFAULT_TOP_N;
  }

  const graph = options.graph ?? new AssetRelationshipGraph({ rules: options.rules, logger });

  return {
    graph,
    metrics: new MetricsCache(),
    logger,
    settings,
  };
}

// ═══════════════════════════════════════════════════════════════
// PROCESS DEFAULT
// ═══════════════════════════════════════════════════════════════

let _instance: GraphContext | null = null;

/**
 * Lazily built process-wide context for scripts.
 * The server builds its own context and passes it explicitly.
 */
export function getGraphContext(): GraphContext {
  if (!_instance) {
    _instance = createGraphContext();
  }
  return _instance;
}

export function initGraphContext(context: GraphContext): GraphContext {
  _instance = context;
  return _instance;
}

export function resetGraphContext(): void {
  _instance = null;
}
