import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PricingService } from '../../application/services/PricingService.js';
import type { Session } from '../../application/services/Session.js';
import type { IInferenceClient } from '../../core/interfaces/IInferenceClient.js';
import { errorMessage } from '../../core/errors.js';
import { redactConfig } from '../../infrastructure/config/ConfigResolver.js';
import type { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';
import { OllamaApiClient } from '../../infrastructure/http/OllamaApiClient.js';
import { textResult } from './replies.js';

type ComponentHealth = { status: 'healthy' | 'error' | 'disabled'; message: string; [detail: string]: unknown };

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  inference: IInferenceClient,
  pricing: PricingService,
  session: Session,
  transcripts?: DatabaseConnection
) {
  server.tool(
    'health-check',
    'Check the health of the assistant and its components (model service, circuit breaker, pricing mode, transcript archive)',
    {},
    async () => {
      let status: 'healthy' | 'degraded' = 'healthy';

      let model: ComponentHealth;
      if (await inference.healthCheck()) {
        model = { status: 'healthy', message: 'Model service is reachable' };
        if (inference instanceof OllamaApiClient) {
          const installed = await inference.listModels().catch((): string[] => []);
          model.model = inference.model;
          model.model_installed = installed.includes(inference.model);
          model.circuitBreaker = inference.getCircuitBreakerStats();
        }
      } else {
        status = 'degraded';
        model = { status: 'error', message: 'Model service is not reachable' };
      }

      let archive: ComponentHealth = { status: 'disabled', message: 'Transcript archive is off' };
      if (transcripts) {
        try {
          const stats = transcripts.getStatistics();
          archive = {
            status: 'healthy',
            message: `${stats.totalTurns} turns in ${stats.totalSessions} sessions`,
            statistics: stats,
          };
        } catch (error) {
          status = 'degraded';
          archive = { status: 'error', message: errorMessage(error) };
        }
      }

      const config = session.config;
      const health = {
        timestamp: new Date().toISOString(),
        status,
        components: {
          model,
          pricing: {
            mode: config.demo_mode || !config.api_key ? 'demo' : 'live',
            server_configured: pricing.hasGateway,
            pending_requests: session.pricing.pendingCount,
          },
          conversation: {
            session: session.id,
            turns: session.context.size,
            capacity: session.context.capacity,
          },
          transcripts: archive,
          settings: redactConfig(config),
        },
      };

      return textResult(`# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``);
    }
  );
}
