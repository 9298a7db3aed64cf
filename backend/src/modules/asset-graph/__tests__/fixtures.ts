/**
 * Test builders for asset graph nodes.
 */

import type { z } from 'zod';
import type {
  BondSchema,
  CommoditySchema,
  CurrencySchema,
  DerivativeSchema,
  EquitySchema,
} from '../contracts/asset-graph.schemas.js';
import { AssetSchema, RegulatoryEventSchema } from '../contracts/asset-graph.schemas.js';
import type { Asset, AssetInput, RegulatoryEvent, RegulatoryEventInput } from '../contracts/asset-graph.types.js';

type EquityInput = z.input<typeof EquitySchema>;
type BondInput = z.input<typeof BondSchema>;
type CommodityInput = z.input<typeof CommoditySchema>;
type CurrencyInput = z.input<typeof CurrencySchema>;
type DerivativeInput = z.input<typeof DerivativeSchema>;

export function equity(id: string, sector: string, extra: Partial<EquityInput> = {}): AssetInput {
  return { id, symbol: id, name: `${id} Inc.`, sector, price: 100, ...extra, assetClass: 'EQUITY' };
}

export function bond(id: string, issuerId: string, extra: Partial<BondInput> = {}): AssetInput {
  return { id, symbol: id, name: `${id} Note`, price: 99, issuerId, ...extra, assetClass: 'BOND' };
}

export function commodity(id: string, exposedSectors: string[], extra: Partial<CommodityInput> = {}): AssetInput {
  return { id, symbol: id, name: `${id} Future`, price: 50, exposedSectors, ...extra, assetClass: 'COMMODITY' };
}

export function currency(
  id: string,
  baseCurrency: string,
  quoteCurrency: string,
  extra: Partial<CurrencyInput> = {},
): AssetInput {
  return {
    id,
    symbol: id,
    name: `${baseCurrency}/${quoteCurrency}`,
    price: 1,
    baseCurrency,
    quoteCurrency,
    exchangeRate: 1,
    ...extra,
    assetClass: 'CURRENCY',
  };
}

export function derivative(id: string, underlyingId: string, extra: Partial<DerivativeInput> = {}): AssetInput {
  return {
    id,
    symbol: id,
    name: `${id} Contract`,
    price: 5,
    underlyingId,
    derivativeType: 'OPTION',
    ...extra,
    assetClass: 'DERIVATIVE',
  };
}

export function event(id: string, impactScore: number, extra: Partial<RegulatoryEventInput> = {}): RegulatoryEventInput {
  return {
    id,
    eventType: 'SEC_FILING',
    description: `${id} filing`,
    effectiveDate: '2026-01-15',
    impactScore,
    ...extra,
  };
}

/** Normalized records, as the rules see them inside the graph */
export const parseAsset = (input: AssetInput): Asset => AssetSchema.parse(input);
export const parseEvent = (input: RegulatoryEventInput): RegulatoryEvent => RegulatoryEventSchema.parse(input);
