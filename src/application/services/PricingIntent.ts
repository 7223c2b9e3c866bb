import type { DesignComponent, DesignSnapshot } from '../../core/entities/Design.js';
import type { PricingQuery } from '../../core/entities/Pricing.js';
import { compareReferences } from '../../core/prompts/DesignDigest.js';

export const MAX_PRICED_COMPONENTS = 8;
export const MAX_ALTERNATIVE_COMPONENTS = 3;

/**
 * Replaceable policy deciding whether a message asks for a lookup
 */
export interface IntentPolicy {
  detect(message: string): boolean;
}

export const DEFAULT_PRICING_KEYWORDS: readonly string[] = [
  'price',
  'prices',
  'pricing',
  'priced',
  'cost',
  'costs',
  'costly',
  'expensive',
  'cheap',
  'cheaper',
  'cheapest',
  'quote',
  'budget',
  'bom',
  'stock',
  'distributor',
  'distributors',
];

export const DEFAULT_ALTERNATIVES_KEYWORDS: readonly string[] = [
  'alternative',
  'alternatives',
  'replace',
  'replacement',
  'replacements',
  'substitute',
  'equivalent',
  'suggest',
  'cheaper',
];

/** Whole-word, case-insensitive keyword match */
export class KeywordIntent implements IntentPolicy {
  private readonly keywords: ReadonlySet<string>;

  constructor(keywords: readonly string[]) {
    this.keywords = new Set(keywords.map((keyword) => keyword.toLowerCase()));
  }

  detect(message: string): boolean {
    const words = message.toLowerCase().match(/[\p{L}]+/gu) ?? [];
    return words.some((word) => this.keywords.has(word));
  }
}

export class KeywordPricingIntent extends KeywordIntent {
  constructor(keywords: readonly string[] = DEFAULT_PRICING_KEYWORDS) {
    super(keywords);
  }
}

export class KeywordAlternativesIntent extends KeywordIntent {
  constructor(keywords: readonly string[] = DEFAULT_ALTERNATIVES_KEYWORDS) {
    super(keywords);
  }
}

/**
 * Components the user names (e.g. "R1", "U3") that exist in the design, in
 * mention order; otherwise the first `limit` components by reference.
 */
export function selectPricingQueries(
  message: string,
  snapshot: DesignSnapshot | undefined,
  limit: number = MAX_PRICED_COMPONENTS
): PricingQuery[] {
  if (!snapshot || snapshot.components.length === 0) return [];

  const mentioned = mentionedComponents(message, snapshot);
  const chosen =
    mentioned.length > 0
      ? mentioned
      : [...snapshot.components].sort((a, b) => compareReferences(a.reference, b.reference));

  return chosen.slice(0, limit).map(toQuery);
}

/**
 * Only the components the user names: an alternatives search for a whole
 * board is never started implicitly.
 */
export function selectAlternativeQueries(
  message: string,
  snapshot: DesignSnapshot | undefined,
  limit: number = MAX_ALTERNATIVE_COMPONENTS
): PricingQuery[] {
  if (!snapshot) return [];
  return mentionedComponents(message, snapshot).slice(0, limit).map(toQuery);
}

function mentionedComponents(message: string, snapshot: DesignSnapshot): DesignComponent[] {
  const byReference = new Map(snapshot.components.map((c) => [c.reference.toUpperCase(), c]));
  return [...new Set((message.match(/\b[A-Za-z]{1,3}\d+\b/g) ?? []).map((ref) => ref.toUpperCase()))]
    .map((ref) => byReference.get(ref))
    .filter((component): component is DesignComponent => component !== undefined);
}

function toQuery(component: DesignComponent): PricingQuery {
  return { component_ref: component.reference, value: component.value, footprint: component.footprint };
}
