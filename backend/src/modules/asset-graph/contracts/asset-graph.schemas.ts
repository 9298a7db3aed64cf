/**
 * ASSET GRAPH SCHEMAS
 * ===================
 *
 * Zod schemas for every value that enters the graph: the five asset
 * variants, regulatory events and the universe fixture file.
 * Parsed output is the normalized record the graph stores.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════
// PRIMITIVES
// ═══════════════════════════════════════════════════════════════

export const ASSET_CLASSES = ['EQUITY', 'BOND', 'COMMODITY', 'CURRENCY', 'DERIVATIVE'] as const;

export const REGULATORY_EVENT_TYPES = [
  'EARNINGS_REPORT',
  'SEC_FILING',
  'DIVIDEND_ANNOUNCEMENT',
  'BOND_ISSUANCE',
  'ACQUISITION',
  'BANKRUPTCY',
  'RATE_DECISION',
  'SANCTION',
] as const;

export const DERIVATIVE_TYPES = ['FUTURE', 'OPTION', 'SWAP', 'FORWARD'] as const;

const nodeId = z.string().trim().min(1, 'must not be empty');
const label = z.string().trim().min(1, 'must not be empty');
const finite = z.number().finite();
const currencyCode = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{3}$/, 'must be a 3-letter currency code')
  .transform((code) => code.toUpperCase());

const isoDate = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}/, 'must be an ISO date')
  .refine((value) => !Number.isNaN(Date.parse(value)), 'must be a valid date');

/** id → factor in (0, 1] */
const exposureMap = z.record(nodeId, z.number().gt(0).max(1));

// ═══════════════════════════════════════════════════════════════
// ASSET VARIANTS
// ═══════════════════════════════════════════════════════════════

const AssetHeaderSchema = z.object({
  id: nodeId,
  symbol: label,
  name: label,
  sector: z.string().trim().min(1).default('Unknown'),
  price: finite.min(0),
  currency: currencyCode.optional(),
  currencyExposure: exposureMap.optional(),
  jurisdiction: z.string().trim().min(1).optional(),
});

export const EquitySchema = AssetHeaderSchema.extend({
  assetClass: z.literal('EQUITY'),
  marketCap: finite.min(0).optional(),
  peRatio: finite.optional(),
  dividendYield: finite.min(0).optional(),
  issuerId: nodeId.optional(),
  commodityExposure: exposureMap.optional(),
});

export const BondSchema = AssetHeaderSchema.extend({
  assetClass: z.literal('BOND'),
  issuerId: nodeId,
  couponRate: finite.min(0).optional(),
  yieldToMaturity: finite.optional(),
  maturityDate: isoDate.optional(),
  creditRating: z.string().trim().min(1).optional(),
});

export const CommoditySchema = AssetHeaderSchema.extend({
  assetClass: z.literal('COMMODITY'),
  contractSize: finite.gt(0).optional(),
  deliveryDate: isoDate.optional(),
  volatility: finite.min(0).optional(),
  exposedSectors: z.array(z.string().trim().min(1)).default([]),
});

export const CurrencySchema = AssetHeaderSchema.extend({
  assetClass: z.literal('CURRENCY'),
  baseCurrency: currencyCode,
  quoteCurrency: currencyCode,
  exchangeRate: finite.gt(0),
  country: z.string().trim().min(1).optional(),
  centralBankRate: finite.optional(),
});

export const DerivativeSchema = AssetHeaderSchema.extend({
  assetClass: z.literal('DERIVATIVE'),
  underlyingId: nodeId,
  derivativeType: z.enum(DERIVATIVE_TYPES),
  expiryDate: isoDate.optional(),
  notional: finite.gt(0).optional(),
});

export const AssetSchema = z
  .discriminatedUnion('assetClass', [
    EquitySchema,
    BondSchema,
    CommoditySchema,
    CurrencySchema,
    DerivativeSchema,
  ])
  .superRefine((asset, ctx) => {
    switch (asset.assetClass) {
      case 'CURRENCY':
        if (asset.baseCurrency === asset.quoteCurrency) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['quoteCurrency'],
            message: 'must differ from baseCurrency',
          });
        }
        break;
      case 'DERIVATIVE':
        if (asset.underlyingId === asset.id) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['underlyingId'],
            message: 'a derivative cannot be its own underlying',
          });
        }
        break;
      default:
        break;
    }
  });

// ═══════════════════════════════════════════════════════════════
// REGULATORY EVENTS
// ═══════════════════════════════════════════════════════════════

export const EventScopeSchema = z.object({
  assetClasses: z.array(z.enum(ASSET_CLASSES)).optional(),
  sectors: z.array(z.string().trim().min(1)).optional(),
  jurisdictions: z.array(z.string().trim().min(1)).optional(),
});

export const RegulatoryEventSchema = z.object({
  id: nodeId,
  eventType: z.enum(REGULATORY_EVENT_TYPES),
  description: label,
  effectiveDate: isoDate,
  /** Signed: negative events hurt the covered assets. */
  impactScore: finite.min(-1).max(1),
  assetId: nodeId.optional(),
  relatedAssets: z.array(nodeId).default([]),
  scope: EventScopeSchema.optional(),
});

// ═══════════════════════════════════════════════════════════════
// UNIVERSE FILE
// ═══════════════════════════════════════════════════════════════

export const UniverseFileSchema = z.object({
  assets: z.array(AssetSchema).default([]),
  events: z.array(RegulatoryEventSchema).default([]),
});
