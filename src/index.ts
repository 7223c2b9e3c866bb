#!/usr/bin/env node

/**
 * PCB Design Assistant MCP Server - Entry Point
 */

import path from 'path';
import { getConfig, printConfigInfo } from './config.js';
import { AssistantMcpServer } from './presentation/AssistantMcpServer.js';
import { ConfigResolver } from './infrastructure/config/ConfigResolver.js';
import { DatabaseConnection } from './infrastructure/database/DatabaseConnection.js';
import { OllamaApiClient } from './infrastructure/http/OllamaApiClient.js';
import { McpPricingGateway } from './infrastructure/mcp/McpPricingGateway.js';
import { createPricingConnector } from './infrastructure/mcp/transports.js';
import { createDebugLog } from './utils/logging.js';

async function main() {
  let assistant: AssistantMcpServer | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    const debugLog = createDebugLog(config.server.debug);

    const inference = new OllamaApiClient({
      apiUrl: config.ollama.apiUrl,
      model: config.ollama.model,
      template: config.ollama.template,
      timeoutMs: config.ollama.timeoutMs,
      retryAttempts: config.ollama.retryAttempts,
      debugLog: createDebugLog(config.server.debug, 'ollama'),
    });

    const pricingGateway = new McpPricingGateway(
      createPricingConnector(config.pricing, path.join(__dirname, 'pricing-server.js')),
      {
        timeoutMs: config.pricing.timeoutMs,
        clientName: config.server.name,
        clientVersion: config.server.version,
        debugLog: createDebugLog(config.server.debug, 'pricing-gateway'),
      }
    );

    const transcripts = config.transcripts.enabled
      ? new DatabaseConnection(config.transcripts.databasePath)
      : undefined;

    assistant = new AssistantMcpServer(config, {
      inference,
      pricingGateway,
      transcripts,
      settings: new ConfigResolver(config.settings.path, { debugLog }),
    });
    await assistant.start();

    // Print statistics
    assistant.printStats();

    // Setup graceful shutdown
    const running = assistant;
    const shutdown = async (signal: string) => {
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);
      await running.shutdown();
      console.error('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection, reason:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    if (assistant) {
      await assistant.shutdown();
    }

    process.exit(1);
  }
}

// Start the server
void main();
