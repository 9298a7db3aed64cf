/**
 * RELATIONSHIP RULES
 * ==================
 *
 * Pure functions deciding whether two nodes are related.
 * Every rule accepts its pair in either order, never throws and
 * returns null instead of a zero-weight edge. Weight range and
 * self-loop checks belong to the graph.
 */

import type { RelationshipRuleConfig } from '../asset-graph.config.js';
import type {
  Asset,
  Bond,
  Commodity,
  Currency,
  Derivative,
  Equity,
  RegulatoryEvent,
  Relationship,
  RelationshipKind,
} from '../contracts/asset-graph.types.js';

export type AssetPairRule = (a: Asset, b: Asset, config: RelationshipRuleConfig) => Relationship | null;

export type EventRule = (event: RegulatoryEvent, asset: Asset, config: RelationshipRuleConfig) => Relationship | null;

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

const UNKNOWN_SECTOR = 'unknown';

export const isEquity = (asset: Asset): asset is Equity => asset.assetClass === 'EQUITY';
export const isBond = (asset: Asset): asset is Bond => asset.assetClass === 'BOND';
export const isCommodity = (asset: Asset): asset is Commodity => asset.assetClass === 'COMMODITY';
export const isCurrency = (asset: Asset): asset is Currency => asset.assetClass === 'CURRENCY';
export const isDerivative = (asset: Asset): asset is Derivative => asset.assetClass === 'DERIVATIVE';

/** Lower-cased sector, or null when it carries no information */
export function normalizeSector(sector: string | undefined): string | null {
  const value = (sector ?? '').trim().toLowerCase();
  return value && value !== UNKNOWN_SECTOR ? value : null;
}

/** An equity's issuer identity falls back to its own id */
export function issuerIdentity(equity: Equity): string {
  return equity.issuerId ?? equity.id;
}

function orderPair<X extends Asset, Y extends Asset>(
  a: Asset,
  b: Asset,
  isX: (asset: Asset) => asset is X,
  isY: (asset: Asset) => asset is Y,
): [X, Y] | null {
  if (isX(a) && isY(b)) return [a, b];
  if (isX(b) && isY(a)) return [b, a];
  return null;
}

const isNotCurrency = (asset: Asset): asset is Exclude<Asset, Currency> => asset.assetClass !== 'CURRENCY';

function strongest(factors: Array<number | undefined>): number {
  let best = 0;
  for (const factor of factors) {
    if (factor !== undefined && Number.isFinite(factor) && factor > best) best = factor;
  }
  return best;
}

/**
 * Build an edge. A zero weight means the rule does not apply; any other
 * value is passed through untouched so the graph can reject it.
 * Bidirectional edges are stored with endpoints in ascending id order.
 */
export function buildMatch(
  kind: RelationshipKind,
  source: string,
  target: string,
  bidirectional: boolean,
  weight: number,
): Relationship | null {
  if (weight === 0) return null;

  if (bidirectional && source > target) {
    return { source: target, target: source, kind, bidirectional, weight };
  }
  return { source, target, kind, bidirectional, weight };
}

// ═══════════════════════════════════════════════════════════════
// ASSET ↔ ASSET RULES
// ═══════════════════════════════════════════════════════════════

/** Two equities in the same (known) sector */
export const sectorAffinityRule: AssetPairRule = (a, b, config) => {
  if (!isEquity(a) || !isEquity(b)) return null;
  const sector = normalizeSector(a.sector);
  if (!sector || sector !== normalizeSector(b.sector)) return null;
  return buildMatch('sector_affinity', a.id, b.id, true, config.sectorAffinity.weight);
};

/** Bond → equity of the same issuer */
export const bondEquityRule: AssetPairRule = (a, b, config) => {
  const pair = orderPair(a, b, isBond, isEquity);
  if (!pair) return null;
  const [bond, equity] = pair;
  if (bond.issuerId !== issuerIdentity(equity)) return null;
  return buildMatch('bond_equity', bond.id, equity.id, false, config.bondEquity.weight);
};

/** Commodity → equity that declares exposure or sits in an exposed sector */
export const commodityExposureRule: AssetPairRule = (a, b, config) => {
  const pair = orderPair(a, b, isCommodity, isEquity);
  if (!pair) return null;
  const [commodity, equity] = pair;

  const declared = equity.commodityExposure?.[commodity.id];
  const sector = normalizeSector(equity.sector);
  const bySector =
    sector !== null && commodity.exposedSectors.some((s) => normalizeSector(s) === sector)
      ? config.commodityExposure.sectorFactor
      : undefined;

  const factor = strongest([declared, bySector]);
  if (factor === 0) return null;
  return buildMatch('commodity_exposure', commodity.id, equity.id, false, config.commodityExposure.weight * factor);
};

/** Currency → any non-currency asset priced in it or declaring exposure to it */
export const currencyRiskRule: AssetPairRule = (a, b, config) => {
  const pair = orderPair(a, b, isCurrency, isNotCurrency);
  if (!pair) return null;
  const [currency, asset] = pair;

  const declared = asset.currencyExposure?.[currency.id];
  const denominated =
    asset.currency !== undefined && asset.currency === currency.baseCurrency
      ? config.currencyRisk.denominationFactor
      : undefined;

  const factor = strongest([declared, denominated]);
  if (factor === 0) return null;
  return buildMatch('currency_risk', currency.id, asset.id, false, config.currencyRisk.weight * factor);
};

/** Underlying → derivative written on it */
export const derivativeUnderlyingRule: AssetPairRule = (a, b, config) => {
  if (isDerivative(a) && a.underlyingId === b.id) {
    return buildMatch('derivative_underlying', b.id, a.id, false, config.derivativeUnderlying.weight);
  }
  if (isDerivative(b) && b.underlyingId === a.id) {
    return buildMatch('derivative_underlying', a.id, b.id, false, config.derivativeUnderlying.weight);
  }
  return null;
};

// ═══════════════════════════════════════════════════════════════
// EVENT → ASSET RULES
// ═══════════════════════════════════════════════════════════════

/**
 * How strongly an event's scope covers an asset, 0 when it does not.
 * Named assets beat sector scope, which beats class / jurisdiction scope.
 */
export function eventRelevance(event: RegulatoryEvent, asset: Asset, config: RelationshipRuleConfig): number {
  if (event.assetId === asset.id || event.relatedAssets.includes(asset.id)) return 1;

  const scope = event.scope;
  if (!scope) return 0;

  const sector = normalizeSector(asset.sector);
  if (sector !== null && (scope.sectors ?? []).some((s) => normalizeSector(s) === sector)) {
    return config.regulatoryImpact.sectorRelevance;
  }

  const jurisdiction = asset.jurisdiction?.toUpperCase();
  const coversClass = (scope.assetClasses ?? []).includes(asset.assetClass);
  const coversJurisdiction =
    jurisdiction !== undefined && (scope.jurisdictions ?? []).some((j) => j.toUpperCase() === jurisdiction);

  return coversClass || coversJurisdiction ? config.regulatoryImpact.scopeRelevance : 0;
}

/** Event → covered asset, weighted by |impact| × relevance */
export const regulatoryImpactRule: EventRule = (event, asset, config) => {
  const relevance = eventRelevance(event, asset, config);
  if (relevance === 0) return null;
  return buildMatch('regulatory_impact', event.id, asset.id, false, Math.abs(event.impactScore) * relevance);
};

// ═══════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════

/** Evaluation order; a later match for the same edge key overwrites an earlier one */
export const ASSET_PAIR_RULES: readonly AssetPairRule[] = [
  sectorAffinityRule,
  bondEquityRule,
  commodityExposureRule,
  currencyRiskRule,
  derivativeUnderlyingRule,
];

export const EVENT_RULES: readonly EventRule[] = [regulatoryImpactRule];

export interface RuleDescription {
  kind: RelationshipKind;
  title: string;
  direction: string;
  strength: string;
}

export function describeRules(config: RelationshipRuleConfig): RuleDescription[] {
  return [
    {
      kind: 'sector_affinity',
      title: 'Equities in the same sector',
      direction: 'bidirectional',
      strength: config.sectorAffinity.weight.toFixed(2),
    },
    {
      kind: 'bond_equity',
      title: 'Corporate bond linked to its issuer equity',
      direction: 'bond → equity',
      strength: config.bondEquity.weight.toFixed(2),
    },
    {
      kind: 'commodity_exposure',
      title: 'Commodity linked to exposed equities',
      direction: 'commodity → equity',
      strength: `${config.commodityExposure.weight.toFixed(2)} × exposure (sector match ${config.commodityExposure.sectorFactor.toFixed(2)})`,
    },
    {
      kind: 'currency_risk',
      title: 'Currency linked to assets priced in or exposed to it',
      direction: 'currency → asset',
      strength: `${config.currencyRisk.weight.toFixed(2)} × exposure (denomination ${config.currencyRisk.denominationFactor.toFixed(2)})`,
    },
    {
      kind: 'derivative_underlying',
      title: 'Derivative linked to its underlying',
      direction: 'underlying → derivative',
      strength: config.derivativeUnderlying.weight.toFixed(2),
    },
    {
      kind: 'regulatory_impact',
      title: 'Regulatory event linked to covered assets',
      direction: 'event → asset',
      strength: `|impact| × relevance (sector ${config.regulatoryImpact.sectorRelevance.toFixed(2)}, scope ${config.regulatoryImpact.scopeRelevance.toFixed(2)})`,
    },
  ];
}
