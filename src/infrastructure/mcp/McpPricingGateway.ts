import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { PartAlternatives, PricingQuery, QuotedPart } from '../../core/entities/Pricing.js';
import type { GatewayCallOptions, IPricingGateway } from '../../core/interfaces/IPricingGateway.js';
import { PricingProtocolError, PricingTransportError, errorMessage } from '../../core/errors.js';
import type { DebugLog } from '../../utils/logging.js';
import { ALTERNATIVES_TOOL, AlternativesResponseSchema, QUOTE_TOOL, QuoteResponseSchema } from './PricingProtocol.js';

/**
 * Opens a transport to the pricing server. The credential travels with the
 * connection (process environment or request header).
 */
export type PricingConnector = (apiKey: string) => Transport;

export interface McpPricingGatewayOptions {
  timeoutMs: number;
  clientName?: string;
  clientVersion?: string;
  debugLog?: DebugLog;
}

const ToolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  structuredContent: z.unknown().optional(),
});

interface Connection {
  apiKey: string;
  client: Promise<Client>;
}

/**
 * Pricing gateway speaking MCP to the pricing server.
 *
 * One `quote_components` or `find_alternatives` call per batch. Timeouts, refused and closed
 * connections reject with PricingTransportError; error results and responses
 * that do not match the schema reject with PricingProtocolError.
 */
export class McpPricingGateway implements IPricingGateway {
  private connection: Connection | undefined;
  private readonly debugLog: DebugLog;

  constructor(
    private readonly connect: PricingConnector,
    private readonly options: McpPricingGatewayOptions
  ) {
    this.debugLog = options.debugLog ?? (() => undefined);
  }

  async fetchOffers(queries: readonly PricingQuery[], options: GatewayCallOptions): Promise<QuotedPart[]> {
    const response = await this.callPricingTool(
      QUOTE_TOOL,
      { parts: toWireParts(queries) },
      QuoteResponseSchema,
      'quote',
      options
    );
    this.debugLog(`Pricing server answered for ${response.results.length} of ${queries.length} component(s)`);

    return response.results.map((part) => ({
      component_ref: part.component_ref,
      offers: part.offers.map((offer) => ({ ...offer, fetched_at: new Date(offer.fetched_at) })),
    }));
  }

  async fetchAlternatives(
    queries: readonly PricingQuery[],
    limit: number,
    options: GatewayCallOptions
  ): Promise<PartAlternatives[]> {
    const response = await this.callPricingTool(
      ALTERNATIVES_TOOL,
      { parts: toWireParts(queries), limit },
      AlternativesResponseSchema,
      'alternatives',
      options
    );
    this.debugLog(`Pricing server found alternatives for ${response.results.length} of ${queries.length} component(s)`);
    return response.results;
  }

  private async callPricingTool<T>(
    name: string,
    args: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
    { apiKey, signal }: GatewayCallOptions
  ): Promise<T> {
    const client = await this.clientFor(apiKey);

    let raw: unknown;
    try {
      raw = await client.callTool({ name, arguments: args }, undefined, { timeout: this.options.timeoutMs, signal });
    } catch (error) {
      throw this.classify(error, apiKey, signal);
    }

    const result = ToolResultSchema.safeParse(raw);
    if (!result.success) {
      throw new PricingProtocolError('Pricing server returned a malformed tool result', { cause: result.error });
    }

    const text = result.data.content.find((item) => item.type === 'text')?.text;
    if (result.data.isError) {
      throw new PricingProtocolError(`Pricing server error: ${text ?? 'unknown error'}`);
    }

    const payload = result.data.structuredContent ?? parseJson(text);
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new PricingProtocolError(`Pricing response does not match the ${label} schema`, { cause: parsed.error });
    }
    return parsed.data;
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = undefined;
    if (!connection) return;

    try {
      const client = await connection.client;
      await client.close();
    } catch (error) {
      this.debugLog(`Pricing client close failed: ${errorMessage(error)}`);
    }
  }

  private clientFor(apiKey: string): Promise<Client> {
    if (this.connection && this.connection.apiKey === apiKey) {
      return this.connection.client;
    }

    // A changed credential needs a fresh connection.
    this.dropConnection();

    const connection: Connection = {
      apiKey,
      client: this.open(apiKey, () => {
        if (this.connection === connection) this.connection = undefined;
      }),
    };
    this.connection = connection;
    connection.client.catch(() => {
      if (this.connection === connection) this.connection = undefined;
    });
    return connection.client;
  }

  private async open(apiKey: string, onClosed: () => void): Promise<Client> {
    const client = new Client(
      {
        name: this.options.clientName ?? 'pcb-design-assistant',
        version: this.options.clientVersion ?? '1.0.0',
      },
      { capabilities: {} }
    );

    try {
      await client.connect(this.connect(apiKey), { timeout: this.options.timeoutMs });
    } catch (error) {
      throw new PricingTransportError(`Cannot connect to pricing server: ${errorMessage(error)}`, { cause: error });
    }

    client.onclose = () => {
      this.debugLog('Pricing server connection closed');
      onClosed();
    };

    this.debugLog('Connected to pricing server');
    return client;
  }

  /**
   * Forget the current connection and close its client, which also stops a
   * spawned stdio server.
   */
  private dropConnection(apiKey?: string): void {
    const stale = this.connection;
    if (!stale || (apiKey !== undefined && stale.apiKey !== apiKey)) return;

    this.connection = undefined;
    stale.client
      .then((client) => client.close())
      .catch((error: unknown) => {
        this.debugLog(`Closing pricing connection failed: ${errorMessage(error)}`);
      });
  }

  private classify(error: unknown, apiKey: string, signal?: AbortSignal): Error {
    if (signal?.aborted) {
      return new PricingTransportError('Pricing request was aborted', { cause: error });
    }
    if (error instanceof McpError) {
      if (error.code === ErrorCode.ConnectionClosed) {
        // onclose already forgot it
        return new PricingTransportError(error.message, { cause: error });
      }
      if (error.code === ErrorCode.RequestTimeout) {
        this.dropConnection(apiKey);
        return new PricingTransportError(error.message, { cause: error });
      }
      return new PricingProtocolError(error.message, { cause: error });
    }

    this.dropConnection(apiKey);
    return new PricingTransportError(errorMessage(error), { cause: error });
  }
}

function toWireParts(queries: readonly PricingQuery[]) {
  return queries.map(({ component_ref, value, footprint }) => ({ component_ref, value, footprint }));
}

function parseJson(text: string | undefined): unknown {
  if (text === undefined) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
