/**
 * METRICS ENGINE
 *
 * Pure functions of a graph snapshot.
 * Density counts distinct connected node pairs, so multi-kind and
 * two-way links between the same pair never push it above 1.
 */

import type {
  AssetClass,
  EventImpactSummary,
  GraphMetrics,
  GraphSnapshot,
  RegulatoryEvent,
  Relationship,
  RelationshipKind,
} from '../contracts/asset-graph.types.js';
import { DEFAULT_TOP_N } from '../asset-graph.config.js';
import type { AssetRelationshipGraph } from './asset-graph.service.js';
import { compareByWeight, compareIds, deepFreeze } from './graph.ordering.js';

export interface MetricsOptions {
  topN?: number;
}

export function relationshipDensity(nodeCount: number, relationships: readonly Relationship[]): number {
  if (nodeCount < 2) return 0;
  const pairs = new Set<string>();
  for (const rel of relationships) {
    const [low, high] = compareIds(rel.source, rel.target) <= 0 ? [rel.source, rel.target] : [rel.target, rel.source];
    pairs.add(`${low}\u0000${high}`);
  }
  const possible = (nodeCount * (nodeCount - 1)) / 2;
  return Math.min(1, pairs.size / possible);
}

/** Weight descending, ties by (source, target, kind) */
export function topRelationships(relationships: readonly Relationship[], n: number): Relationship[] {
  const limit = Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
  return [...relationships].sort(compareByWeight).slice(0, limit);
}

export function averageWeight(relationships: readonly Relationship[]): number {
  if (relationships.length === 0) return 0;
  const total = relationships.reduce((sum, rel) => sum + rel.weight, 0);
  return total / relationships.length;
}

export function assetClassDistribution(snapshot: GraphSnapshot): Record<AssetClass, number> {
  const counts: Record<AssetClass, number> = { EQUITY: 0, BOND: 0, COMMODITY: 0, CURRENCY: 0, DERIVATIVE: 0 };
  for (const asset of snapshot.assets) counts[asset.assetClass] += 1;
  return counts;
}

export function relationshipDistribution(relationships: readonly Relationship[]): Record<RelationshipKind, number> {
  const counts: Record<RelationshipKind, number> = {
    sector_affinity: 0,
    bond_equity: 0,
    commodity_exposure: 0,
    currency_risk: 0,
    derivative_underlying: 0,
    regulatory_impact: 0,
  };
  for (const rel of relationships) counts[rel.kind] += 1;
  return counts;
}

export function eventImpactSummary(events: readonly RegulatoryEvent[]): EventImpactSummary {
  if (events.length === 0) return { positive: 0, negative: 0, averageImpact: 0 };
  return {
    positive: events.filter((e) => e.impactScore > 0).length,
    negative: events.filter((e) => e.impactScore < 0).length,
    averageImpact: events.reduce((sum, e) => sum + e.impactScore, 0) / events.length,
  };
}

export function computeMetrics(snapshot: GraphSnapshot, options: MetricsOptions = {}): GraphMetrics {
  const { relationships } = snapshot;
  const totalNodes = snapshot.assets.length + snapshot.events.length;

  return {
    revision: snapshot.revision,
    totalAssets: snapshot.assets.length,
    totalEvents: snapshot.events.length,
    totalNodes,
    totalRelationships: relationships.length,
    averageWeight: averageWeight(relationships),
    density: relationshipDensity(totalNodes, relationships),
    topRelationships: topRelationships(relationships, options.topN ?? DEFAULT_TOP_N),
    assetClassDistribution: assetClassDistribution(snapshot),
    relationshipDistribution: relationshipDistribution(relationships),
    eventImpact: eventImpactSummary(snapshot.events),
  };
}

// ═══════════════════════════════════════════════════════════════
// CACHE
// ═══════════════════════════════════════════════════════════════

/** Memoizes metrics until the graph's next mutation */
export class MetricsCache {
  private cached: { revision: number; topN: number; metrics: GraphMetrics } | null = null;
  private hits = 0;
  private misses = 0;

  get(graph: AssetRelationshipGraph, topN: number = DEFAULT_TOP_N): GraphMetrics {
    const cached = this.cached;
    if (cached && cached.revision === graph.revision && cached.topN === topN) {
      this.hits += 1;
      return cached.metrics;
    }

    this.misses += 1;
    const metrics = deepFreeze(computeMetrics(graph.snapshot(), { topN }));
    this.cached = { revision: graph.revision, topN, metrics };
    return metrics;
  }

  invalidate(): void {
    this.cached = null;
  }

  getStats(): { hits: number; misses: number } {
    return { hits: this.hits, misses: this.misses };
  }
}
