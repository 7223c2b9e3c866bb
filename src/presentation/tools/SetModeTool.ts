import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Session } from '../../application/services/Session.js';
import { ANALYSIS_CONTEXTS, INTERACTION_MODES, LANGUAGE_TAGS } from '../../core/entities/Settings.js';
import type { ModeConfig } from '../../core/entities/Settings.js';
import { errorMessage } from '../../core/errors.js';
import { ModeFactory } from '../../core/modes/ModeFactory.js';
import { LANGUAGES } from '../../core/modes/languages.js';
import type { ConfigResolver } from '../../infrastructure/config/ConfigResolver.js';
import { errorResult, textResult } from './replies.js';

export function describeMode(mode: ModeConfig): string {
  return [
    `Interaction mode: ${mode.interaction_mode} (${ModeFactory.getStrategy(mode.interaction_mode).getName()})`,
    `Language: ${LANGUAGES[mode.language].name} (${mode.language})`,
    `Analysis context: ${mode.analysis_context === 'pcb' ? 'PCB layout' : 'schematic'}`,
  ].join('\n');
}

/**
 * Every interaction mode with what it does, the active one marked
 */
export function modeHelp(active: ModeConfig): string {
  const lines = ModeFactory.getAllStrategies().map((strategy) => {
    const marker = strategy.mode === active.interaction_mode ? ' ← active' : '';
    return `- **${strategy.getName()}** (\`${strategy.mode}\`): ${strategy.describe()}${marker}`;
  });
  return ['# Interaction Modes', '', ...lines, '', 'Choose the mode that fits your experience level.'].join('\n');
}

/**
 * Register the set-mode tool. Conversation memory is kept across mode changes.
 */
export function registerSetModeTool(server: McpServer, session: Session, settings: ConfigResolver) {
  server.tool(
    'set-mode',
    'Change the interaction mode, reply language or analysis context. Without arguments, shows the current mode; ' +
      'with help, lists the interaction modes.',
    {
      interaction_mode: z
        .enum(INTERACTION_MODES)
        .optional()
        .describe("'analysis' (information only), 'advisory' (numbered steps, confirmation) or 'assistant' (directive guidance)"),
      language: z.enum(LANGUAGE_TAGS).optional().describe('Reply language tag'),
      analysis_context: z.enum(ANALYSIS_CONTEXTS).optional().describe("'pcb' or 'schematic'"),
      help: z.boolean().optional().describe('List the interaction modes and what each one does'),
    },
    async ({ interaction_mode, language, analysis_context, help }) => {
      if (help) {
        return textResult(modeHelp(session.mode));
      }
      if (!interaction_mode && !language && !analysis_context) {
        return textResult(`# Current Mode\n\n${describeMode(session.mode)}`);
      }

      const current = session.config;
      try {
        const saved = settings.save({
          ...current,
          ai_mode: interaction_mode ?? session.mode.interaction_mode,
          language: language ?? session.mode.language,
          analysis_context: analysis_context ?? session.mode.analysis_context,
        });
        session.applyConfig(saved);
      } catch (error) {
        return errorResult(`Mode not changed: ${errorMessage(error)}`);
      }

      return textResult(`✓ Mode updated\n\n${describeMode(session.mode)}`);
    }
  );
}
