import type { InteractionMode } from '../entities/Settings.js';

/**
 * What a mode strategy needs to know about the turn being compiled
 */
export interface ModeBriefing {
  /** The latest user turn asks about changing the design */
  modificationRequested: boolean;
  purpose: 'chat' | 'review';
}

/**
 * One compilation strategy per interaction mode
 */
export interface ModeStrategy {
  readonly mode: InteractionMode;

  /**
   * Behavioural contract block for the system prompt
   */
  compileSection(briefing: ModeBriefing): string;

  /**
   * Human readable name and one-line description for status messages
   */
  getName(): string;
  describe(): string;
}
