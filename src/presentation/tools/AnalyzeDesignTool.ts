import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Session } from '../../application/services/Session.js';
import type { TurnOrchestrator } from '../../application/services/TurnOrchestrator.js';
import { DesignSnapshotSchema } from '../../core/entities/Design.js';
import { MODEL_TIMEOUT_SHAPE, errorResult, formatReply, inferenceFailureNotice, textResult } from './replies.js';

/**
 * Register the analyze-design tool (the "Analyze PCB / Analyze Schematic" action)
 */
export function registerAnalyzeDesignTool(server: McpServer, orchestrator: TurnOrchestrator, session: Session) {
  server.tool(
    'analyze-design',
    'Request a design review of the supplied board or schematic snapshot',
    {
      design: DesignSnapshotSchema.describe('Snapshot of the open board or schematic'),
      fetch_pricing: z.boolean().optional().describe('Include component pricing in the review'),
      timeout_ms: MODEL_TIMEOUT_SHAPE,
    },
    async ({ design, fetch_pricing, timeout_ms }, extra) => {
      try {
        const reply = await orchestrator.analyzeDesign(session, design, {
          fetchPricing: fetch_pricing,
          timeoutMs: timeout_ms,
          signal: extra.signal,
        });
        return textResult(formatReply(reply));
      } catch (error) {
        return errorResult(inferenceFailureNotice(error));
      }
    }
  );
}
