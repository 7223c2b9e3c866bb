import type { ModeBriefing, ModeStrategy } from './types.js';

export const AUTONOMY_DISCLOSURE =
  'Note: this assistant does not modify your design; you apply every change yourself.';

/**
 * Directive guidance naming concrete editor controls
 */
export class AssistantMode implements ModeStrategy {
  readonly mode = 'assistant' as const;

  compileSection(briefing: ModeBriefing): string {
    const lines = [
      'ASSISTANT MODE: Give directive, step-by-step guidance.',
      'Name the exact editor elements to use: menu paths, toolbar buttons, dialogs and hotkeys ' +
        '(for example "Edit > Delete" or the Delete key).',
      `DISCLOSURE RULE: End every answer with this sentence: "${AUTONOMY_DISCLOSURE}"`,
    ];

    if (briefing.modificationRequested) {
      lines.push(
        'IMPORTANT: The latest request involves modifying the design. Walk through it step by step and ' +
          'follow the DISCLOSURE RULE.'
      );
    }

    return lines.join('\n');
  }

  getName(): string {
    return 'Assistant Mode';
  }

  describe(): string {
    return 'Interactive step-by-step guidance (changes stay manual)';
  }
}
