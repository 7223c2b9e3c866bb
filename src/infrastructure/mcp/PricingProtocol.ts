import { z } from 'zod';
import { MAX_GATEWAY_BATCH } from '../../core/interfaces/IPricingGateway.js';

/** Tools exposed by the pricing server and called by the pricing gateway */
export const QUOTE_TOOL = 'quote_components';
export const ALTERNATIVES_TOOL = 'find_alternatives';

export const MAX_ALTERNATIVES = 5;

export const PartQuerySchema = z.object({
  component_ref: z.string().min(1).describe('Reference designator, e.g. R1'),
  value: z.string().describe('Declared value, e.g. 10k or STM32F103C8T6'),
  footprint: z.string().describe('Footprint or package name'),
});

export const QuoteRequestShape = {
  parts: z.array(PartQuerySchema).min(1).max(MAX_GATEWAY_BATCH).describe('Components to price in one batch'),
};

export const AlternativesRequestShape = {
  parts: z.array(PartQuerySchema).min(1).max(MAX_GATEWAY_BATCH).describe('Components to find replacements for'),
  limit: z.number().int().min(1).max(MAX_ALTERNATIVES).default(3).describe('Most candidates per component'),
};

export const WireOfferSchema = z.object({
  distributor_id: z.string().min(1),
  unit_price: z.number().nonnegative(),
  currency: z.string().min(1),
  stock_quantity: z.number().int().nonnegative(),
  fetched_at: z.string().datetime({ offset: true }),
});

export const QuoteResponseSchema = z.object({
  results: z.array(
    z.object({
      component_ref: z.string(),
      offers: z.array(WireOfferSchema),
    })
  ),
});

export const WireAlternativeSchema = z.object({
  mpn: z.string().min(1),
  manufacturer: z.string(),
  description: z.string(),
  unit_price: z.number().nonnegative().optional(),
  currency: z.string().min(1).optional(),
  stock_quantity: z.number().int().nonnegative().optional(),
});

export const AlternativesResponseSchema = z.object({
  results: z.array(
    z.object({
      component_ref: z.string(),
      alternatives: z.array(WireAlternativeSchema),
    })
  ),
});

export type WireOffer = z.infer<typeof WireOfferSchema>;
export type QuoteResponse = z.infer<typeof QuoteResponseSchema>;
export type WireAlternative = z.infer<typeof WireAlternativeSchema>;
export type AlternativesResponse = z.infer<typeof AlternativesResponseSchema>;
