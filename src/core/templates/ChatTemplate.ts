import type { Turn } from '../entities/Conversation.js';
import type { PromptTemplate, PromptPayload, ChatMessage } from './types.js';

/**
 * Chat template using a structured messages array (Ollama /api/chat).
 * Ollama applies the model's own turn markup, this template only orders messages.
 */
export class ChatTemplate implements PromptTemplate {
  formatPrompt(history: readonly Turn[], systemPrompt: string): PromptPayload {
    const messages: ChatMessage[] = [{ role: 'system', content: systemPrompt }];

    for (const turn of history) {
      messages.push({ role: turn.role, content: turn.content });
    }

    return { type: 'chat', messages };
  }

  getName(): string {
    return 'Chat (structured messages)';
  }
}
