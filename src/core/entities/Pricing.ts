/**
 * Pricing domain entities
 */
export interface PricingQuery {
  component_ref: string;
  value: string;
  footprint: string;
}

export interface Offer {
  distributor_id: string;
  unit_price: number;
  currency: string;
  stock_quantity: number;
  fetched_at: Date;
}

/**
 * One component's offers as returned by the pricing protocol
 */
export interface QuotedPart {
  component_ref: string;
  offers: Offer[];
}

export type PricingSource = 'live' | 'demo';

export interface PricingResult {
  component_ref: string;
  offers: Offer[];
  /** Always one of `offers` when present */
  best_offer?: Offer;
  source: PricingSource;
}

/**
 * A part that could replace a component
 */
export interface AlternativePart {
  mpn: string;
  manufacturer: string;
  description: string;
  /** Typical unit price, when the source knows one */
  unit_price?: number;
  currency?: string;
  stock_quantity?: number;
}

/**
 * One component's replacement candidates as returned by the pricing protocol
 */
export interface PartAlternatives {
  component_ref: string;
  alternatives: AlternativePart[];
}

export interface AlternativesResult extends PartAlternatives {
  source: PricingSource;
}

/**
 * Outcome of one batch call, kept explicit so degrade-vs-fail is a visible branch.
 */
export type PricingOutcome =
  | { kind: 'live'; results: PricingResult[] }
  | { kind: 'demo'; results: PricingResult[]; reason: string }
  | { kind: 'failed'; error: Error };
