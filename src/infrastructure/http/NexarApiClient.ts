import fetch from 'node-fetch';
import type { Response } from 'node-fetch';
import { z } from 'zod';
import type { PricingQuery } from '../../core/entities/Pricing.js';
import { PricingProtocolError, PricingTransportError, errorMessage } from '../../core/errors.js';
import type { AlternativesResponse, QuoteResponse, WireAlternative, WireOffer } from '../mcp/PricingProtocol.js';

export const NEXAR_GRAPHQL_URL = 'https://api.nexar.com/graphql';

const PriceSchema = z.object({
  quantity: z.number(),
  price: z.number(),
  currency: z.string(),
});

const SellerSchema = z.object({
  company: z.object({ name: z.string() }),
  offers: z.array(
    z.object({
      inventoryLevel: z.number().nullable().default(0),
      prices: z.array(PriceSchema),
    })
  ),
});

const SellerSearchSchema = z
  .object({
    results: z
      .array(z.object({ part: z.object({ sellers: z.array(SellerSchema) }) }))
      .nullable()
      .default([]),
  })
  .nullable();

const SimilarPartSchema = z.object({
  mpn: z.string().min(1),
  manufacturer: z.object({ name: z.string() }).nullable().default(null),
  shortDescription: z.string().nullable().default(null),
  totalAvail: z.number().nullable().default(null),
  medianPrice1000: z.object({ price: z.number(), currency: z.string() }).nullable().default(null),
});

const SimilarSearchSchema = z
  .object({
    results: z
      .array(z.object({ part: z.object({ similarParts: z.array(SimilarPartSchema).nullable().default([]) }) }))
      .nullable()
      .default([]),
  })
  .nullable();

const GraphQLErrorsSchema = z.array(z.object({ message: z.string() })).optional();

export const QUOTE_SELECTION =
  'results { part { sellers { company { name } offers { inventoryLevel prices { quantity price currency } } } } }';
export const ALTERNATIVES_SELECTION =
  'results { part { similarParts { mpn manufacturer { name } shortDescription totalAvail medianPrice1000 { price currency } } } }';

type Seller = z.infer<typeof SellerSchema>;
type SimilarPart = z.infer<typeof SimilarPartSchema>;

/** Refused credential; the pricing server reports it as an `unauthorized:` error result */
export class NexarUnauthorizedError extends PricingProtocolError {
  constructor(message: string) {
    super(`unauthorized: ${message}`);
    this.name = 'NexarUnauthorizedError';
  }
}

export interface NexarClientOptions {
  endpoint?: string;
  timeoutMs?: number;
  now?: () => Date;
}

/**
 * Nexar supply search over GraphQL. All parts of a batch go into one request
 * as aliased `supSearch` fields.
 */
export class NexarApiClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly token: string,
    options: NexarClientOptions = {}
  ) {
    this.endpoint = options.endpoint ?? NEXAR_GRAPHQL_URL;
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.now = options.now ?? (() => new Date());
  }

  async quote(parts: readonly PricingQuery[]): Promise<QuoteResponse> {
    const data = await this.search('Quote', parts, QUOTE_SELECTION, SellerSearchSchema);
    const fetchedAt = this.now().toISOString();

    return {
      results: parts.map((part, index) => {
        const sellers = data[`p${index}`]?.results?.[0]?.part.sellers ?? [];
        return {
          component_ref: part.component_ref,
          offers: sellers.flatMap((seller) => toOffer(seller, fetchedAt)),
        };
      }),
    };
  }

  /**
   * Similar parts of the best search match, in the order Nexar ranks them
   */
  async alternatives(parts: readonly PricingQuery[], limit: number): Promise<AlternativesResponse> {
    const data = await this.search('Alternatives', parts, ALTERNATIVES_SELECTION, SimilarSearchSchema);

    return {
      results: parts.map((part, index) => {
        const similar = data[`p${index}`]?.results?.[0]?.part.similarParts ?? [];
        return {
          component_ref: part.component_ref,
          alternatives: similar.slice(0, limit).map(toAlternative),
        };
      }),
    };
  }

  private async search<T>(
    operation: string,
    parts: readonly PricingQuery[],
    selection: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<Record<string, T>> {
    const { query, variables } = buildSearchQuery(parts, selection, operation);

    let res: Response;
    try {
      res = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.token}`,
        },
        body: JSON.stringify({ query, variables }),
        timeout: this.timeoutMs,
      });
    } catch (error) {
      throw new PricingTransportError(`Nexar request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (res.status === 401 || res.status === 403) {
      throw new NexarUnauthorizedError(`Nexar rejected the token (HTTP ${res.status})`);
    }
    if (!res.ok) {
      throw new PricingTransportError(`Nexar returned HTTP ${res.status}`);
    }

    const parsed = z
      .object({ data: z.record(schema).nullable().optional(), errors: GraphQLErrorsSchema })
      .safeParse(await res.json());
    if (!parsed.success) {
      throw new PricingProtocolError('Nexar response has an unexpected shape', { cause: parsed.error });
    }
    if (!parsed.data.data && parsed.data.errors?.length) {
      throw new PricingProtocolError(`Nexar query failed: ${parsed.data.errors.map((e) => e.message).join('; ')}`);
    }

    return parsed.data.data ?? {};
  }
}

export function buildSearchQuery(
  parts: readonly PricingQuery[],
  selection: string = QUOTE_SELECTION,
  operation = 'Quote'
): { query: string; variables: Record<string, string> } {
  const variables: Record<string, string> = {};
  const declarations: string[] = [];
  const fields: string[] = [];

  parts.forEach((part, index) => {
    variables[`q${index}`] = [part.value, part.footprint].filter((term) => term.trim().length > 0).join(' ') || part.component_ref;
    declarations.push(`$q${index}: String!`);
    fields.push(`p${index}: supSearch(q: $q${index}, limit: 1) { ${selection} }`);
  });

  return { query: `query ${operation}(${declarations.join(', ')}) {\n  ${fields.join('\n  ')}\n}`, variables };
}

/**
 * One offer per seller: its single-unit (lowest quantity break) price and its
 * total stock across listings.
 */
function toOffer(seller: Seller, fetchedAt: string): WireOffer[] {
  let best: z.infer<typeof PriceSchema> | undefined;
  let stock = 0;

  for (const offer of seller.offers) {
    stock += offer.inventoryLevel ?? 0;
    for (const price of offer.prices) {
      if (!best || price.quantity < best.quantity || (price.quantity === best.quantity && price.price < best.price)) {
        best = price;
      }
    }
  }

  if (!best) return [];
  return [
    {
      distributor_id: distributorId(seller.company.name),
      unit_price: best.price,
      currency: best.currency,
      stock_quantity: Math.max(0, Math.floor(stock)),
      fetched_at: fetchedAt,
    },
  ];
}

function toAlternative(part: SimilarPart): WireAlternative {
  return {
    mpn: part.mpn,
    manufacturer: part.manufacturer?.name ?? 'unknown',
    description: part.shortDescription ?? '',
    ...(part.medianPrice1000 ? { unit_price: part.medianPrice1000.price, currency: part.medianPrice1000.currency } : {}),
    ...(part.totalAvail !== null ? { stock_quantity: Math.max(0, Math.floor(part.totalAvail)) } : {}),
  };
}

/** "Digi-Key" -> "digikey", "Mouser Electronics" -> "mouser" */
export function distributorId(companyName: string): string {
  const first = companyName.toLowerCase().split(/\s+/)[0] ?? '';
  return first.replace(/[^a-z0-9]/g, '') || companyName.toLowerCase();
}
