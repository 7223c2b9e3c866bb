/**
 * Template system for formatting requests for different model types
 */
export type { PromptTemplate, PromptPayload, ChatMessage, TemplateType } from './types.js';
export { LegacyTemplate } from './LegacyTemplate.js';
export { ChatTemplate } from './ChatTemplate.js';
export { TemplateFactory } from './TemplateFactory.js';
