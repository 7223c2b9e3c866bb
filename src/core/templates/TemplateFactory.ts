import type { PromptTemplate, TemplateType } from './types.js';
import { LegacyTemplate } from './LegacyTemplate.js';
import { ChatTemplate } from './ChatTemplate.js';

const TEMPLATES: { readonly [K in TemplateType]: PromptTemplate } = {
  legacy: new LegacyTemplate(),
  chat: new ChatTemplate(),
};

/** Model families that understand Ollama's chat endpoint */
const CHAT_FAMILIES = ['llama3', 'llama-3', 'mistral', 'qwen', 'command-r', 'cohere', 'chatml'];

export class TemplateFactory {
  static getTemplate(type: TemplateType): PromptTemplate {
    return TEMPLATES[type];
  }

  static detectTemplateType(modelName: string): TemplateType {
    const name = modelName.toLowerCase();
    return CHAT_FAMILIES.some((family) => name.includes(family)) ? 'chat' : 'legacy';
  }

  /**
   * An explicit override wins (case-insensitive); anything that is not a
   * known template type is returned as-is so validation can reject it.
   */
  static resolveTemplateType(modelName: string, override?: string): string {
    return override ? override.toLowerCase() : this.detectTemplateType(modelName);
  }
}
