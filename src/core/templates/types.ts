import type { Turn } from '../entities/Conversation.js';

/**
 * Chat message format for structured conversation
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Payload types for the two Ollama endpoints
 */
export type PromptPayload =
  | {
      type: 'generate';
      prompt: string;
      system?: string;
    }
  | {
      type: 'chat';
      messages: ChatMessage[];
    };

/**
 * Template type identifiers
 */
export type TemplateType = 'legacy' | 'chat';

/**
 * Turns an ordered context window plus a system prompt into a request payload.
 * The window already ends with the user's latest turn.
 */
export interface PromptTemplate {
  formatPrompt(history: readonly Turn[], systemPrompt: string): PromptPayload;

  getName(): string;
}
