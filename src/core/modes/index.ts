/**
 * Interaction mode strategies
 */
export type { ModeStrategy, ModeBriefing } from './types.js';
export { AnalysisMode } from './AnalysisMode.js';
export { AdvisoryMode, CONFIRMATION_CLAUSE } from './AdvisoryMode.js';
export { AssistantMode, AUTONOMY_DISCLOSURE } from './AssistantMode.js';
export { ModeFactory } from './ModeFactory.js';
export { LANGUAGES } from './languages.js';
export type { LanguageProfile } from './languages.js';
