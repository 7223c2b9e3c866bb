import type { ModeBriefing, ModeStrategy } from './types.js';

export const CONFIRMATION_CLAUSE =
  'CONFIRMATION RULE: End every answer that involves modifying the design with an explicit confirmation ' +
  'question before the user acts on it, such as "Would you like me to guide you through these steps?"';

/**
 * Step-guided advice that always stops for confirmation
 */
export class AdvisoryMode implements ModeStrategy {
  readonly mode = 'advisory' as const;

  compileSection(briefing: ModeBriefing): string {
    const lines = [
      'ADVISORY MODE: Express every actionable suggestion as a numbered sequence of steps (1., 2., 3., ...), ' +
        'one action per step.',
      'Add a safety warning to any step that can break connectivity or violate design rules.',
      CONFIRMATION_CLAUSE,
    ];

    if (briefing.modificationRequested) {
      lines.push('IMPORTANT: The latest request involves modifying the design. Follow the CONFIRMATION RULE.');
    }

    return lines.join('\n');
  }

  getName(): string {
    return 'Advisory Mode';
  }

  describe(): string {
    return 'Step-by-step guidance with user confirmation';
  }
}
