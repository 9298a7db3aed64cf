/**
 * ASSET GRAPH TYPES
 * =================
 *
 * Assets are a closed tagged union keyed by `assetClass`.
 * Regulatory events are graph nodes that originate edges but are not tradable.
 */

import type { z } from 'zod';
import type {
  AssetSchema,
  BondSchema,
  CommoditySchema,
  CurrencySchema,
  DerivativeSchema,
  EquitySchema,
  EventScopeSchema,
  RegulatoryEventSchema,
  UniverseFileSchema,
} from './asset-graph.schemas.js';
import type { ASSET_CLASSES, REGULATORY_EVENT_TYPES } from './asset-graph.schemas.js';

// ═══════════════════════════════════════════════════════════════
// NODES
// ═══════════════════════════════════════════════════════════════

export type AssetClass = (typeof ASSET_CLASSES)[number];

export type Equity = z.infer<typeof EquitySchema>;
export type Bond = z.infer<typeof BondSchema>;
export type Commodity = z.infer<typeof CommoditySchema>;
export type Currency = z.infer<typeof CurrencySchema>;
export type Derivative = z.infer<typeof DerivativeSchema>;

/** Normalized asset as stored by the graph */
export type Asset = z.infer<typeof AssetSchema>;

/** What callers hand to `addAsset` (defaults not yet applied) */
export type AssetInput = z.input<typeof AssetSchema>;

export type RegulatoryEventType = (typeof REGULATORY_EVENT_TYPES)[number];
export type EventScope = z.infer<typeof EventScopeSchema>;
export type RegulatoryEvent = z.infer<typeof RegulatoryEventSchema>;
export type RegulatoryEventInput = z.input<typeof RegulatoryEventSchema>;

export type UniverseFile = z.infer<typeof UniverseFileSchema>;

export interface Universe {
  assets: readonly AssetInput[];
  events: readonly RegulatoryEventInput[];
}

export type NodeClass = AssetClass | 'REGULATORY_EVENT';

// ═══════════════════════════════════════════════════════════════
// RELATIONSHIPS
// ═══════════════════════════════════════════════════════════════

export const RELATIONSHIP_KINDS = [
  'sector_affinity',
  'bond_equity',
  'commodity_exposure',
  'currency_risk',
  'derivative_underlying',
  'regulatory_impact',
] as const;

export type RelationshipKind = (typeof RELATIONSHIP_KINDS)[number];

export interface Relationship {
  source: string;
  target: string;
  kind: RelationshipKind;
  /** false = directed source → target */
  bidirectional: boolean;
  /** Strength in (0, 1] */
  weight: number;
}

// ═══════════════════════════════════════════════════════════════
// SNAPSHOT
// ═══════════════════════════════════════════════════════════════

export interface GraphSnapshot {
  revision: number;
  assets: readonly Asset[];
  events: readonly RegulatoryEvent[];
  relationships: readonly Relationship[];
}

// ═══════════════════════════════════════════════════════════════
// LAYOUT
// ═══════════════════════════════════════════════════════════════

export interface Point3D {
  x: number;
  y: number;
  z: number;
}

export interface NodeLayout extends Point3D {
  id: string;
  label: string;
  nodeClass: NodeClass;
  size: number;
  color: string;
  /** Relationship count */
  importance: number;
}

export interface EdgeLayout {
  source: string;
  target: string;
  sourcePosition: Point3D;
  targetPosition: Point3D;
  weight: number;
  kind: RelationshipKind;
  bidirectional: boolean;
  color: string;
}

export interface GraphLayout {
  seed: string;
  nodes: NodeLayout[];
  edges: EdgeLayout[];
}

// ═══════════════════════════════════════════════════════════════
// METRICS
// ═══════════════════════════════════════════════════════════════

export interface EventImpactSummary {
  positive: number;
  negative: number;
  averageImpact: number;
}

export interface GraphMetrics {
  revision: number;
  totalAssets: number;
  totalEvents: number;
  totalNodes: number;
  totalRelationships: number;
  averageWeight: number;
  /** Connected unordered pairs / possible pairs, in [0, 1] */
  density: number;
  topRelationships: Relationship[];
  assetClassDistribution: Record<AssetClass, number>;
  relationshipDistribution: Record<RelationshipKind, number>;
  eventImpact: EventImpactSummary;
}
