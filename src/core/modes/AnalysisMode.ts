import type { ModeBriefing, ModeStrategy } from './types.js';

/**
 * Information only. The wording here must never ask for numbered edit steps.
 */
export class AnalysisMode implements ModeStrategy {
  readonly mode = 'analysis' as const;

  compileSection(briefing: ModeBriefing): string {
    const lines = [
      'ANALYSIS MODE: Provide analysis, observations and options only.',
      'Do not propose direct modifications to the design and do not write instructions for editing it.',
      'Phrase every suggestion as information or as an option the designer may weigh, for example ' +
        '"a larger bulk capacitor near the regulator is one option to consider".',
    ];

    if (briefing.modificationRequested) {
      lines.push(
        'The user is asking about changing the design. Explain the trade-offs and the options involved ' +
          'without telling them how to carry out the change.'
      );
    }

    return lines.join('\n');
  }

  getName(): string {
    return 'Analysis Mode';
  }

  describe(): string {
    return 'Safe analysis and recommendations only';
  }
}
