/**
 * ASSET GRAPH: Rule & Layout Configuration
 *
 * Weights are relationship strengths in (0, 1].
 * Factors scale a weight for partial matches, also in (0, 1].
 */

import { z } from 'zod';
import type { NodeClass, RelationshipKind } from './contracts/asset-graph.types.js';

// ═══════════════════════════════════════════════════════════════
// RELATIONSHIP RULES
// ═══════════════════════════════════════════════════════════════

const unitWeight = z.number().gt(0).max(1);

export const RelationshipRuleConfigSchema = z.object({
  sectorAffinity: z.object({ weight: unitWeight }),
  bondEquity: z.object({ weight: unitWeight }),
  commodityExposure: z.object({
    weight: unitWeight,
    sectorFactor: unitWeight,   // equity sector listed by the commodity
  }),
  currencyRisk: z.object({
    weight: unitWeight,
    denominationFactor: unitWeight, // asset priced in the currency
  }),
  derivativeUnderlying: z.object({ weight: unitWeight }),
  regulatoryImpact: z.object({
    sectorRelevance: unitWeight,
    scopeRelevance: unitWeight, // asset class / jurisdiction coverage
  }),
});

export type RelationshipRuleConfig = z.infer<typeof RelationshipRuleConfigSchema>;

export type RelationshipRuleOverrides = {
  [K in keyof RelationshipRuleConfig]?: Partial<RelationshipRuleConfig[K]>;
};

export const DEFAULT_RULE_CONFIG: RelationshipRuleConfig = {
  sectorAffinity: { weight: 0.7 },
  bondEquity: { weight: 0.9 },
  commodityExposure: { weight: 0.8, sectorFactor: 0.5 },
  currencyRisk: { weight: 1.0, denominationFactor: 0.6 },
  derivativeUnderlying: { weight: 0.85 },
  regulatoryImpact: { sectorRelevance: 0.75, scopeRelevance: 0.5 },
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws a ZodError on out-of-range values.
 */
export function resolveRuleConfig(overrides: RelationshipRuleOverrides = {}): RelationshipRuleConfig {
  return RelationshipRuleConfigSchema.parse({
    sectorAffinity: { ...DEFAULT_RULE_CONFIG.sectorAffinity, ...overrides.sectorAffinity },
    bondEquity: { ...DEFAULT_RULE_CONFIG.bondEquity, ...overrides.bondEquity },
    commodityExposure: { ...DEFAULT_RULE_CONFIG.commodityExposure, ...overrides.commodityExposure },
    currencyRisk: { ...DEFAULT_RULE_CONFIG.currencyRisk, ...overrides.currencyRisk },
    derivativeUnderlying: { ...DEFAULT_RULE_CONFIG.derivativeUnderlying, ...overrides.derivativeUnderlying },
    regulatoryImpact: { ...DEFAULT_RULE_CONFIG.regulatoryImpact, ...overrides.regulatoryImpact },
  });
}

// ═══════════════════════════════════════════════════════════════
// LAYOUT
// ═══════════════════════════════════════════════════════════════

export interface LayoutConfig {
  seed: string | number;
  scale: number;
  baseSize: number;
  sizeStep: number;
  maxSize: number;
  classRadius: Record<NodeClass, number>;
  classColors: Record<NodeClass, string>;
  kindColors: Record<RelationshipKind, string>;
}

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  seed: 42,
  scale: 1,
  baseSize: 8,
  sizeStep: 2,
  maxSize: 30,
  // Each class sits on its own shell so clusters stay readable
  classRadius: {
    EQUITY: 1.0,
    BOND: 1.4,
    COMMODITY: 1.8,
    CURRENCY: 2.2,
    DERIVATIVE: 2.6,
    REGULATORY_EVENT: 3.0,
  },
  classColors: {
    EQUITY: '#1f77b4',
    BOND: '#2ca02c',
    COMMODITY: '#ff7f0e',
    CURRENCY: '#d62728',
    DERIVATIVE: '#9467bd',
    REGULATORY_EVENT: '#7f7f7f',
  },
  kindColors: {
    sector_affinity: '#FF6B6B',
    bond_equity: '#96CEB4',
    commodity_exposure: '#FFEAA7',
    currency_risk: '#45B7D1',
    derivative_underlying: '#DDA0DD',
    regulatory_impact: '#FFA07A',
  },
};

export const DEFAULT_TOP_N = 10;
