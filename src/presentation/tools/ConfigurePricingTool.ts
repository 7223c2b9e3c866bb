import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Session } from '../../application/services/Session.js';
import type { Config } from '../../core/entities/Settings.js';
import { errorMessage } from '../../core/errors.js';
import type { ConfigResolver } from '../../infrastructure/config/ConfigResolver.js';
import { redactConfig } from '../../infrastructure/config/ConfigResolver.js';
import { errorResult, textResult } from './replies.js';

export function describePricing(config: Config): string {
  const { api_key } = redactConfig(config);
  return config.demo_mode
    ? `Pricing: DEMO (synthetic estimates)${api_key ? `, key ${api_key} stored` : ', no key configured'}`
    : `Pricing: LIVE (key ${api_key})`;
}

/**
 * Register the configure-pricing tool
 */
export function registerConfigurePricingTool(server: McpServer, session: Session, settings: ConfigResolver) {
  server.tool(
    'configure-pricing',
    'Store the pricing API key and choose between live and demo pricing. An empty api_key removes the stored key.',
    {
      api_key: z.string().optional().describe('Pricing service token'),
      demo_mode: z.boolean().optional().describe('Force synthetic demo pricing'),
    },
    async ({ api_key, demo_mode }) => {
      const current = session.config;
      const apiKey = api_key === undefined ? current.api_key : api_key.trim() || undefined;

      try {
        const saved = settings.save({
          ...current,
          api_key: apiKey,
          // A newly supplied key switches to live pricing unless demo mode is asked for.
          demo_mode: demo_mode ?? (api_key ? false : current.demo_mode),
        });
        session.applyConfig(saved);
        return textResult(`✓ Settings saved\n\n${describePricing(saved)}`);
      } catch (error) {
        return errorResult(`Settings not saved: ${errorMessage(error)}\n\n${describePricing(current)}`);
      }
    }
  );
}
