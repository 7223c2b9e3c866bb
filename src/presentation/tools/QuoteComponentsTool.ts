import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PricingQuery } from '../../core/entities/Pricing.js';
import { errorMessage } from '../../core/errors.js';
import { QUOTE_TOOL, QuoteRequestShape } from '../../infrastructure/mcp/PricingProtocol.js';
import type { AlternativesResponse, QuoteResponse } from '../../infrastructure/mcp/PricingProtocol.js';
import type { DebugLog } from '../../utils/logging.js';
import { errorResult } from './replies.js';

/**
 * Distributor data behind the pricing server
 */
export interface PartCatalog {
  quote(parts: readonly PricingQuery[]): Promise<QuoteResponse>;
  alternatives(parts: readonly PricingQuery[], limit: number): Promise<AlternativesResponse>;
}

export const NO_CREDENTIAL_ERROR = 'unauthorized: no pricing credential configured (set NEXAR_TOKEN)';

/**
 * Register the quote_components tool. Without a catalog (no credential) every
 * call returns an "unauthorized" error result.
 */
export function registerQuoteComponentsTool(server: McpServer, catalog: PartCatalog | undefined, debugLog: DebugLog) {
  server.tool(
    QUOTE_TOOL,
    'Quote distributor offers (unit price, currency, stock) for a batch of components',
    QuoteRequestShape,
    async ({ parts }) => {
      if (!catalog) {
        return errorResult(NO_CREDENTIAL_ERROR);
      }

      try {
        const response = await catalog.quote(parts);
        debugLog(`${QUOTE_TOOL}: ${parts.length} part(s), ${response.results.length} result(s)`);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(response) }],
          structuredContent: response,
        };
      } catch (error) {
        console.error(`Error quoting components: ${errorMessage(error)}`);
        return errorResult(errorMessage(error));
      }
    }
  );
}
