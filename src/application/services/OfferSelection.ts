import type { Offer } from '../../core/entities/Pricing.js';

export const DEFAULT_DISTRIBUTOR_PRIORITY: readonly string[] = ['digikey', 'mouser', 'farnell', 'newark', 'arrow'];

/**
 * Lowest unit price among in-stock offers, or among all offers when none is in stock.
 * Equal prices fall back to the distributor priority list, then to the distributor id.
 */
export function selectBestOffer(
  offers: readonly Offer[],
  priority: readonly string[] = DEFAULT_DISTRIBUTOR_PRIORITY
): Offer | undefined {
  const inStock = offers.filter((offer) => offer.stock_quantity > 0);
  const pool = inStock.length > 0 ? inStock : offers;
  const ranking = priority.map((id) => id.toLowerCase());

  const rank = (distributorId: string): number => {
    const index = ranking.indexOf(distributorId.toLowerCase());
    return index === -1 ? ranking.length : index;
  };

  let best: Offer | undefined;
  for (const offer of pool) {
    if (!best) {
      best = offer;
      continue;
    }
    const byPrice = offer.unit_price - best.unit_price;
    const byRank = rank(offer.distributor_id) - rank(best.distributor_id);
    if (byPrice < 0 || (byPrice === 0 && (byRank < 0 || (byRank === 0 && offer.distributor_id < best.distributor_id)))) {
      best = offer;
    }
  }
  return best;
}
