/**
 * User-facing settings and per-session mode selection
 */
export const INTERACTION_MODES = ['analysis', 'advisory', 'assistant'] as const;
export type InteractionMode = (typeof INTERACTION_MODES)[number];

export const LANGUAGE_TAGS = ['en', 'nl', 'de', 'es', 'fr', 'pt'] as const;
export type LanguageTag = (typeof LANGUAGE_TAGS)[number];

export const ANALYSIS_CONTEXTS = ['pcb', 'schematic'] as const;
export type AnalysisContext = (typeof ANALYSIS_CONTEXTS)[number];

export interface ModeConfig {
  readonly interaction_mode: InteractionMode;
  readonly language: LanguageTag;
  readonly analysis_context: AnalysisContext;
}

/**
 * Resolved settings for one session. `api_key` is a secret.
 */
export interface Config {
  api_key?: string;
  demo_mode: boolean;
  language: LanguageTag;
  ai_mode: InteractionMode;
  analysis_context: AnalysisContext;
}
