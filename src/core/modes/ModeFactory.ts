import { INTERACTION_MODES } from '../entities/Settings.js';
import type { InteractionMode } from '../entities/Settings.js';
import type { ModeStrategy } from './types.js';
import { AnalysisMode } from './AnalysisMode.js';
import { AdvisoryMode } from './AdvisoryMode.js';
import { AssistantMode } from './AssistantMode.js';

// A new InteractionMode fails to compile until it has a strategy here.
const strategies: { readonly [K in InteractionMode]: ModeStrategy & { readonly mode: K } } = {
  analysis: new AnalysisMode(),
  advisory: new AdvisoryMode(),
  assistant: new AssistantMode(),
};

/**
 * Factory for interaction mode strategies
 */
export class ModeFactory {
  static getStrategy(mode: InteractionMode): ModeStrategy {
    return strategies[mode];
  }

  static getAllStrategies(): ModeStrategy[] {
    return INTERACTION_MODES.map((mode) => strategies[mode]);
  }
}
