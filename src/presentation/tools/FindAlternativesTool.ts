import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { errorMessage } from '../../core/errors.js';
import { ALTERNATIVES_TOOL, AlternativesRequestShape } from '../../infrastructure/mcp/PricingProtocol.js';
import type { DebugLog } from '../../utils/logging.js';
import { NO_CREDENTIAL_ERROR } from './QuoteComponentsTool.js';
import type { PartCatalog } from './QuoteComponentsTool.js';
import { errorResult } from './replies.js';

/**
 * Register the find_alternatives tool
 */
export function registerFindAlternativesTool(server: McpServer, catalog: PartCatalog | undefined, debugLog: DebugLog) {
  server.tool(
    ALTERNATIVES_TOOL,
    'Find parts that could replace each component (manufacturer part number, description, typical price, stock)',
    AlternativesRequestShape,
    async ({ parts, limit }) => {
      if (!catalog) {
        return errorResult(NO_CREDENTIAL_ERROR);
      }

      try {
        const response = await catalog.alternatives(parts, limit);
        debugLog(`${ALTERNATIVES_TOOL}: ${parts.length} part(s), limit ${limit}`);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(response) }],
          structuredContent: response,
        };
      } catch (error) {
        console.error(`Error finding alternatives: ${errorMessage(error)}`);
        return errorResult(errorMessage(error));
      }
    }
  );
}
