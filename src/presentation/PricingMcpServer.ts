import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { DebugLog } from '../utils/logging.js';
import { registerFindAlternativesTool } from './tools/FindAlternativesTool.js';
import { registerQuoteComponentsTool } from './tools/QuoteComponentsTool.js';
import type { PartCatalog } from './tools/QuoteComponentsTool.js';

/**
 * Companion MCP server that answers component pricing and alternatives requests
 */
export class PricingMcpServer {
  readonly server: BaseMcpServer;

  constructor(
    info: { name: string; version: string },
    catalog: PartCatalog | undefined,
    private readonly debugLog: DebugLog
  ) {
    this.server = new BaseMcpServer(info);
    registerQuoteComponentsTool(this.server, catalog, debugLog);
    registerFindAlternativesTool(this.server, catalog, debugLog);
  }

  async connect(transport: Transport) {
    await this.server.connect(transport);
  }

  async start() {
    process.stdin.on('error', (error) => {
      console.error('⚠️ stdin error (non-fatal):', error.message);
    });

    await this.connect(new StdioServerTransport());
    console.error('✅ PCB pricing MCP server running on stdio');
    this.debugLog('stdio transport connected successfully');
  }

  async close() {
    await this.server.close();
  }
}
