import type { AlternativePart, PartAlternatives, PricingQuery, QuotedPart, Offer } from '../../core/entities/Pricing.js';
import { referencePrefix } from '../../core/prompts/DesignDigest.js';

export type ComponentClass =
  | 'resistor'
  | 'capacitor'
  | 'inductor'
  | 'diode'
  | 'led'
  | 'transistor'
  | 'ic'
  | 'connector'
  | 'crystal'
  | 'switch'
  | 'fuse'
  | 'other';

/** Base unit price in USD per component class */
export const PRICE_BANDS: { readonly [K in ComponentClass]: number } = {
  resistor: 0.01,
  capacitor: 0.02,
  inductor: 0.08,
  diode: 0.05,
  led: 0.06,
  transistor: 0.12,
  ic: 1.5,
  connector: 0.45,
  crystal: 0.3,
  switch: 0.25,
  fuse: 0.15,
  other: 0.2,
};

const PREFIX_CLASSES: Readonly<Record<string, ComponentClass>> = {
  R: 'resistor',
  RN: 'resistor',
  C: 'capacitor',
  L: 'inductor',
  FB: 'inductor',
  D: 'diode',
  LED: 'led',
  Q: 'transistor',
  T: 'transistor',
  U: 'ic',
  IC: 'ic',
  J: 'connector',
  P: 'connector',
  CN: 'connector',
  Y: 'crystal',
  X: 'crystal',
  SW: 'switch',
  S: 'switch',
  F: 'fuse',
};

// First match wins, so longer package names come before their substrings.
const PACKAGE_MULTIPLIERS: ReadonlyArray<[RegExp, number]> = [
  [/bga/, 2.5],
  [/[lt]qfp|qfp/, 1.6],
  [/qfn|dfn/, 1.4],
  [/t?ssop|soic|so-\d/, 1.2],
  [/sot/, 1.1],
  [/0201|0402/, 0.8],
  [/0603/, 0.9],
  [/0805/, 1.0],
  [/1206/, 1.2],
  [/1210|2010|2512/, 1.6],
  [/tht|dip|axial|radial|to-\d/, 1.3],
];

const PRICE_SPREAD = 0.15;
const OUT_OF_STOCK_ODDS = 1 / 8;
const OFFERS_PER_PART = 3;

// Obviously invented names, so a demo suggestion is never mistaken for a real part.
const DEMO_MANUFACTURERS = ['Demo Components', 'Sample Semiconductor', 'Placeholder Passives', 'Example Devices', 'Mock Parts'];

export interface SyntheticPricingOptions {
  seed?: number;
  distributors?: readonly string[];
  currency?: string;
  now?: () => Date;
}

export function classifyComponent(query: PricingQuery): ComponentClass {
  const described = `${query.value} ${query.footprint}`.toLowerCase();
  const cls = PREFIX_CLASSES[referencePrefix(query.component_ref)] ?? 'other';
  if (cls === 'diode' && described.includes('led')) return 'led';
  return cls;
}

export function packageMultiplier(footprint: string): number {
  const name = footprint.toLowerCase();
  const match = PACKAGE_MULTIPLIERS.find(([pattern]) => pattern.test(name));
  return match ? match[1] : 1.0;
}

/**
 * Demo price generator.
 *
 * Class band x package multiplier, then a per-distributor spread of +/-15 %
 * and a stock level drawn from a PRNG seeded by the query. The same seed and
 * query always give the same offers; only `fetched_at` follows the clock.
 */
export class SyntheticPricing {
  private readonly seed: number;
  private readonly distributors: readonly string[];
  private readonly currency: string;
  private readonly now: () => Date;

  constructor(options: SyntheticPricingOptions = {}) {
    this.seed = options.seed ?? 0;
    this.distributors = (options.distributors ?? ['digikey', 'mouser', 'farnell']).slice(0, OFFERS_PER_PART);
    this.currency = options.currency ?? 'USD';
    this.now = options.now ?? (() => new Date());
  }

  quote(query: PricingQuery): QuotedPart {
    const base = PRICE_BANDS[classifyComponent(query)] * packageMultiplier(query.footprint);
    const fetchedAt = this.now();

    const offers: Offer[] = this.distributors.map((distributor) => {
      const random = mulberry32(
        fnv1a(`${this.seed}|${query.component_ref}|${query.value}|${query.footprint}|${distributor}`)
      );
      const factor = 1 + (random() * 2 - 1) * PRICE_SPREAD;
      const inStock = random() >= OUT_OF_STOCK_ODDS;

      return {
        distributor_id: distributor,
        unit_price: Math.max(0.0001, Math.round(base * factor * 10000) / 10000),
        currency: this.currency,
        stock_quantity: inStock ? 100 + Math.floor(random() * 49900) : 0,
        fetched_at: fetchedAt,
      };
    });

    return { component_ref: query.component_ref, offers };
  }

  /**
   * Demo replacement candidates: invented part numbers priced within the
   * same band as the component.
   */
  alternatives(query: PricingQuery, limit: number): PartAlternatives {
    const base = PRICE_BANDS[classifyComponent(query)] * packageMultiplier(query.footprint);
    const label = query.value.toUpperCase().replace(/[^A-Z0-9]+/g, '') || query.component_ref.toUpperCase();
    const subject = query.value.trim() || query.component_ref;
    const count = Math.max(0, Math.min(limit, DEMO_MANUFACTURERS.length));

    const alternatives: AlternativePart[] = DEMO_MANUFACTURERS.slice(0, count).map((manufacturer, index) => {
      const random = mulberry32(
        fnv1a(`${this.seed}|${query.component_ref}|${query.value}|${query.footprint}|alt${index}`)
      );
      const factor = 1 + (random() * 2 - 1) * PRICE_SPREAD;

      return {
        mpn: `DEMO-${label}-${String(index + 1).padStart(3, '0')}`,
        manufacturer,
        description: `Demo alternative to ${subject}${query.footprint.trim() ? ` in ${query.footprint.trim()}` : ''}`,
        unit_price: Math.max(0.0001, Math.round(base * factor * 10000) / 10000),
        currency: this.currency,
        stock_quantity: 100 + Math.floor(random() * 49900),
      };
    });

    return { component_ref: query.component_ref, alternatives };
  }
}

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
