import type { PricingResult } from '../entities/Pricing.js';

export const MAX_PRICED_ENTRIES = 12;

export const LIVE_PRICING_LABEL = '=== COMPONENT PRICING (LIVE distributor data) ===';
export const DEMO_PRICING_LABEL = '=== COMPONENT PRICING (DEMO DATA: synthetic estimates, not real prices) ===';
export const MIXED_PRICING_LABEL = '=== COMPONENT PRICING (MIXED: LIVE and DEMO entries) ===';

export const DEMO_DISCLOSURE =
  'Entries tagged DEMO are synthetic placeholder prices. Whenever you mention them, tell the user plainly ' +
  'that they are demo prices and not live distributor quotes.';
export const LIVE_NOTICE =
  'Entries tagged LIVE come from distributor data. Treat them as facts and do not invent other prices.';

/**
 * Labeled pricing block. Provenance is stated per entry and in the header.
 */
export function formatPricingSection(results: readonly PricingResult[]): string {
  const entries = results.slice(0, MAX_PRICED_ENTRIES);
  const hasLive = entries.some((result) => result.source === 'live');
  const hasDemo = entries.some((result) => result.source === 'demo');

  const label = hasLive && hasDemo ? MIXED_PRICING_LABEL : hasDemo ? DEMO_PRICING_LABEL : LIVE_PRICING_LABEL;
  const lines = [label];

  for (const result of entries) {
    const tag = result.source === 'live' ? 'LIVE' : 'DEMO';
    const best = result.best_offer;
    const offerCount = `${result.offers.length} offer${result.offers.length === 1 ? '' : 's'}`;
    lines.push(
      best
        ? `${result.component_ref} [${tag}]: best ${best.distributor_id} ${best.unit_price.toFixed(4)} ${best.currency}, ` +
            `stock ${best.stock_quantity} (${offerCount})`
        : `${result.component_ref} [${tag}]: no offers`
    );
  }

  if (results.length > entries.length) {
    lines.push(`... ${results.length - entries.length} more components not shown`);
  }
  if (hasLive) lines.push(LIVE_NOTICE);
  if (hasDemo) lines.push(DEMO_DISCLOSURE);

  return lines.join('\n');
}
