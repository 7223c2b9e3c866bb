import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Session } from '../../application/services/Session.js';
import type { TurnOrchestrator } from '../../application/services/TurnOrchestrator.js';
import { DesignSnapshotSchema } from '../../core/entities/Design.js';
import type { DebugLog } from '../../utils/logging.js';
import { MODEL_TIMEOUT_SHAPE, errorResult, formatReply, inferenceFailureNotice, textResult } from './replies.js';

/**
 * Register the ask-assistant tool
 */
export function registerAskAssistantTool(
  server: McpServer,
  orchestrator: TurnOrchestrator,
  session: Session,
  debugLog: DebugLog
) {
  server.tool(
    'ask-assistant',
    'Ask the PCB design assistant a question about the current design. Replies follow the active interaction mode and language.',
    {
      message: z.string().min(1).describe('The user message'),
      design: DesignSnapshotSchema.optional().describe('Snapshot of the open board or schematic, if any'),
      fetch_pricing: z.boolean().optional().describe('Look up component pricing even if the message does not ask for it'),
      timeout_ms: MODEL_TIMEOUT_SHAPE,
    },
    async ({ message, design, fetch_pricing, timeout_ms }, extra) => {
      debugLog(`ask-assistant: ${message.length} chars, design ${design ? 'attached' : 'absent'}`);
      try {
        const reply = await orchestrator.handleUserMessage(message, session, {
          design,
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
