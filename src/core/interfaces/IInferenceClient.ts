import type { Turn } from '../entities/Conversation.js';

export interface InferenceOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Interface for the language-model call. Failures reject with InferenceError.
 */
export interface IInferenceClient {
  /**
   * Produce the assistant's reply for the given system prompt and ordered history
   */
  infer(systemPrompt: string, history: readonly Turn[], options?: InferenceOptions): Promise<string>;

  /**
   * Health check for the model service
   */
  healthCheck(): Promise<boolean>;
}
