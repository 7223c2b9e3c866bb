import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Session } from '../../application/services/Session.js';
import type { TurnRecord } from '../../core/entities/Conversation.js';
import { errorMessage } from '../../core/errors.js';
import { errorResult, textResult } from './replies.js';

/**
 * Register the manage-conversation tool
 */
export function registerManageConversationTool(server: McpServer, session: Session) {
  server.tool(
    'manage-conversation',
    'Manage conversation memory - view the remembered turns, get a summary, read the archived transcript, or clear it',
    {
      action: z
        .enum(['view', 'summary', 'transcript', 'clear'])
        .describe(
          "Action to perform: 'view' to see memory, 'summary' for an overview, 'transcript' for every archived turn, 'clear' to reset"
        ),
    },
    async ({ action }) => {
      switch (action) {
        case 'view': {
          const turns = session.context.window();
          if (turns.length === 0) {
            return textResult('No conversation history yet.');
          }

          const historyText = turns
            .map((turn, idx) => {
              const role = turn.role === 'user' ? '👤 User' : '🤖 Assistant';
              return `${idx + 1}. **${role}** (${turn.timestamp.toISOString()})\n${turn.content}\n`;
            })
            .join('\n---\n\n');

          return textResult(`# Conversation Memory (${turns.length}/${session.context.capacity} turns)\n\n${historyText}`);
        }

        case 'summary':
          return textResult(session.context.summary());

        case 'transcript': {
          let records: TurnRecord[] | undefined;
          try {
            records = session.context.transcript();
          } catch (error) {
            return errorResult(`Transcript archive could not be read: ${errorMessage(error)}`);
          }

          if (!records) {
            return textResult('Transcript archive is disabled.');
          }
          if (records.length === 0) {
            return textResult('No archived turns for this session.');
          }

          const lines = records.map((record) => {
            const role = record.role === 'user' ? '👤 User' : '🤖 Assistant';
            return `${record.turn_index + 1}. **${role}** (${record.created_at})\n${record.content}\n`;
          });
          return textResult(`# Transcript (${records.length} turns)\n\n${lines.join('\n---\n\n')}`);
        }

        case 'clear':
          session.context.reset();
          return textResult('✓ Conversation memory cleared');
      }
    }
  );
}
