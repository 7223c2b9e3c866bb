import type { PartAlternatives, PricingQuery, QuotedPart } from '../entities/Pricing.js';

/** Most components one gateway call may carry */
export const MAX_GATEWAY_BATCH = 50;

export interface GatewayCallOptions {
  apiKey: string;
  signal?: AbortSignal;
}

/**
 * Interface for the external pricing tool protocol.
 * Rejects with PricingTransportError or PricingProtocolError.
 */
export interface IPricingGateway {
  fetchOffers(queries: readonly PricingQuery[], options: GatewayCallOptions): Promise<QuotedPart[]>;

  /**
   * Up to `limit` replacement candidates per component
   */
  fetchAlternatives(queries: readonly PricingQuery[], limit: number, options: GatewayCallOptions): Promise<PartAlternatives[]>;

  close(): Promise<void>;
}
