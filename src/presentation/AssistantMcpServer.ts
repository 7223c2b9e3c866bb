import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { ServerConfig } from '../config.js';
import { PricingService } from '../application/services/PricingService.js';
import { Session } from '../application/services/Session.js';
import { SyntheticPricing } from '../application/services/SyntheticPricing.js';
import { TurnOrchestrator } from '../application/services/TurnOrchestrator.js';
import type { IInferenceClient } from '../core/interfaces/IInferenceClient.js';
import type { IPricingGateway } from '../core/interfaces/IPricingGateway.js';
import { errorMessage } from '../core/errors.js';
import type { ConfigResolver } from '../infrastructure/config/ConfigResolver.js';
import { redactConfig } from '../infrastructure/config/ConfigResolver.js';
import type { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { TranscriptRepository } from '../infrastructure/database/repositories/TranscriptRepository.js';
import { createDebugLog } from '../utils/logging.js';
import type { DebugLog } from '../utils/logging.js';
import { registerAskAssistantTool } from './tools/AskAssistantTool.js';
import { registerAnalyzeDesignTool } from './tools/AnalyzeDesignTool.js';
import { registerSetModeTool } from './tools/SetModeTool.js';
import { registerConfigurePricingTool } from './tools/ConfigurePricingTool.js';
import { registerManageConversationTool } from './tools/ManageConversationTool.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';

export interface AssistantServices {
  inference: IInferenceClient;
  settings: ConfigResolver;
  pricingGateway?: IPricingGateway;
  transcripts?: DatabaseConnection;
}

/**
 * Main MCP server: one design session wired to the orchestrator and tools
 */
export class AssistantMcpServer {
  readonly server: BaseMcpServer;
  readonly session: Session;
  private readonly orchestrator: TurnOrchestrator;
  private readonly pricing: PricingService;
  private readonly debugLog: DebugLog;

  constructor(
    private readonly config: ServerConfig,
    private readonly services: AssistantServices
  ) {
    this.debugLog = createDebugLog(config.server.debug);

    const settings = services.settings.resolve();
    this.session = new Session(settings, {
      capacity: config.conversation.capacity,
      transcriptRepo: services.transcripts ? new TranscriptRepository(services.transcripts.getDatabase()) : undefined,
    });
    this.debugLog(`Session ${this.session.id} started with settings ${JSON.stringify(redactConfig(settings))}`);

    this.pricing = new PricingService(services.pricingGateway, {
      timeoutMs: config.pricing.timeoutMs,
      distributorPriority: config.pricing.distributorPriority,
      synthetic: new SyntheticPricing({
        seed: config.pricing.demoSeed,
        distributors: config.pricing.distributorPriority,
      }),
      debugLog: createDebugLog(config.server.debug, 'pricing'),
    });

    this.orchestrator = new TurnOrchestrator(services.inference, this.pricing, {
      pricingWaitMs: config.pricing.waitMs,
      debugLog: createDebugLog(config.server.debug, 'turn'),
    });

    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });
    this.registerTools();
  }

  private registerTools() {
    registerAskAssistantTool(this.server, this.orchestrator, this.session, this.debugLog);
    registerAnalyzeDesignTool(this.server, this.orchestrator, this.session);
    registerSetModeTool(this.server, this.session, this.services.settings);
    registerConfigurePricingTool(this.server, this.session, this.services.settings);
    registerManageConversationTool(this.server, this.session);
    registerHealthCheckTool(
      this.server,
      this.services.inference,
      this.pricing,
      this.session,
      this.services.transcripts
    );
  }

  async connect(transport: Transport) {
    await this.server.connect(transport);
  }

  /**
   * Start the MCP server on stdio
   */
  async start() {
    // Add stdio error handling to prevent unexpected disconnections
    process.stdin.on('error', (error) => {
      console.error('⚠️ stdin error (non-fatal):', error.message);
    });

    process.stdout.on('error', (error) => {
      console.error('⚠️ stdout error (non-fatal):', error.message);
    });

    process.stdin.on('end', () => {
      console.error('⚠️ stdin ended - client may have disconnected');
    });

    await this.connect(new StdioServerTransport());
    console.error(`\n✅ PCB Design Assistant MCP Server running on stdio`);
    this.debugLog('stdio transport connected successfully');
  }

  printStats() {
    if (!this.services.transcripts) return;
    const stats = this.services.transcripts.getStatistics();
    console.error(
      `📊 Transcript archive: ${stats.totalSessions} sessions, ${stats.totalTurns} turns, ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
  }

  /**
   * Graceful shutdown
   */
  async shutdown() {
    console.error('\n👋 Shutting down gracefully...');

    this.session.pricing.clear();
    await this.server.close();

    if (this.services.pricingGateway) {
      await this.services.pricingGateway.close();
    }

    try {
      this.services.transcripts?.close();
    } catch (error) {
      console.error(`⚠️ Closing transcript archive failed: ${errorMessage(error)}`);
    }
  }
}
