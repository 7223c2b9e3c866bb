import type { Turn } from '../entities/Conversation.js';
import type { PromptTemplate, PromptPayload } from './types.js';

const EXCERPT_LENGTH = 200;

/**
 * Text template for models without a chat format (Ollama /api/generate).
 *
 * Format:
 * Recent conversation:
 * User: question 1...
 * Assistant: answer 1...
 *
 * User question: question 2
 */
export class LegacyTemplate implements PromptTemplate {
  formatPrompt(history: readonly Turn[], systemPrompt: string): PromptPayload {
    const last = history[history.length - 1];
    const question = last && last.role === 'user' ? last.content : '';
    const earlier = question ? history.slice(0, -1) : history;

    let prompt = '';
    if (earlier.length > 0) {
      prompt += 'Recent conversation:\n';
      for (const turn of earlier) {
        const role = turn.role === 'user' ? 'User' : 'Assistant';
        prompt += `${role}: ${excerpt(turn.content)}\n`;
      }
      prompt += '\n';
    }
    prompt += `User question: ${question}`;

    return { type: 'generate', prompt, system: systemPrompt };
  }

  getName(): string {
    return 'Legacy (text-based)';
  }
}

function excerpt(text: string): string {
  return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH)}...` : text;
}
