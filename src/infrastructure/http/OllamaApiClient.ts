import fetch from 'node-fetch';
import type { Response } from 'node-fetch';
import { z } from 'zod';
import type { Turn } from '../../core/entities/Conversation.js';
import type { IInferenceClient, InferenceOptions } from '../../core/interfaces/IInferenceClient.js';
import { InferenceError, errorMessage } from '../../core/errors.js';
import type { TemplateType } from '../../core/templates/types.js';
import { TemplateFactory } from '../../core/templates/TemplateFactory.js';
import { withRetry, CircuitBreaker, CircuitOpenError, DEFAULT_RETRY_CONFIG } from '../../utils/retry.js';
import type { RetryConfig } from '../../utils/retry.js';
import type { DebugLog } from '../../utils/logging.js';

const ChatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

const GenerateResponseSchema = z.object({
  response: z.string(),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const HEALTH_TIMEOUT_MS = 5000;

export interface OllamaClientOptions {
  apiUrl: string;
  model: string;
  template: TemplateType;
  timeoutMs?: number;
  retryAttempts?: number;
  circuitBreaker?: CircuitBreaker;
  debugLog?: DebugLog;
}

/**
 * Ollama API client.
 * Low temperature keeps design advice close to the supplied project data.
 */
export class OllamaApiClient implements IInferenceClient {
  private readonly apiUrl: string;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly retryConfig: RetryConfig;
  private readonly debugLog: DebugLog;

  constructor(private readonly options: OllamaClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker(5, 60000);
    this.retryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      maxAttempts: options.retryAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
      timeoutMs: options.timeoutMs ?? DEFAULT_RETRY_CONFIG.timeoutMs,
    };
    this.debugLog = options.debugLog ?? (() => undefined);
  }

  async infer(systemPrompt: string, history: readonly Turn[], options: InferenceOptions = {}): Promise<string> {
    const template = TemplateFactory.getTemplate(this.options.template);
    const payload = template.formatPrompt(history, systemPrompt);
    this.debugLog(`${template.getName()} request with ${history.length} turn(s)`);
    const timeoutMs = options.timeoutMs ?? this.retryConfig.timeoutMs;
    const { signal } = options;

    const body =
      payload.type === 'chat'
        ? { endpoint: '/api/chat', json: { model: this.options.model, messages: payload.messages } }
        : {
            endpoint: '/api/generate',
            json: { model: this.options.model, prompt: payload.prompt, system: payload.system },
          };

    try {
      return await this.circuitBreaker.execute(
        () =>
          withRetry(
            () => abortable(this.post(body.endpoint, body.json, payload.type, timeoutMs), signal),
            // The request's own timeout fires first; this is the outer bound.
            { ...this.retryConfig, timeoutMs: timeoutMs + 1000 },
            {
              shouldRetry: (error) => !signal?.aborted && isTransient(error),
              onTimeout: (ms) => new InferenceError(`Model call timed out after ${ms}ms`, 'timeout'),
              onLog: (log) => {
                if (!log.success) this.debugLog(`Inference attempt ${log.attempt} failed: ${log.error}`);
              },
            }
          ),
        (error) => !(error instanceof InferenceError && (error.kind === 'cancelled' || error.kind === 'malformed'))
      );
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        throw new InferenceError('The language model is temporarily unavailable', 'unavailable', { cause: error });
      }
      throw error instanceof InferenceError ? error : new InferenceError(errorMessage(error), 'connection', { cause: error });
    }
  }

  async listModels(): Promise<string[]> {
    const res = await fetch(`${this.apiUrl}/api/tags`, {
      method: 'GET',
      headers: { 'Content-Type': 'application/json' },
      timeout: HEALTH_TIMEOUT_MS,
    });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);

    const data = TagsResponseSchema.parse(await res.json());
    return data.models.map((model) => model.name);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.listModels();
      return true;
    } catch (error) {
      this.debugLog(`Ollama health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  get model(): string {
    return this.options.model;
  }

  getCircuitBreakerStats() {
    return this.circuitBreaker.getStats();
  }

  private async post(endpoint: string, json: object, kind: 'chat' | 'generate', timeoutMs: number): Promise<string> {
    let res: Response;
    try {
      res = await fetch(`${this.apiUrl}${endpoint}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        timeout: timeoutMs,
        body: JSON.stringify({
          ...json,
          stream: false,
          options: {
            num_ctx: 4096,
            temperature: 0.3,
            top_p: 0.8,
            keep_alive: '10m',
          },
        }),
      });
    } catch (error) {
      const timedOut = error instanceof Error && 'type' in error && error.type === 'request-timeout';
      throw new InferenceError(
        timedOut ? `Model call timed out after ${timeoutMs}ms` : `Cannot reach Ollama at ${this.apiUrl}: ${errorMessage(error)}`,
        timedOut ? 'timeout' : 'connection',
        { cause: error }
      );
    }

    if (!res.ok) {
      throw new InferenceError(`Ollama returned HTTP ${res.status}`, 'http');
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (error) {
      throw new InferenceError('Ollama returned a response that is not JSON', 'malformed', { cause: error });
    }

    const parsed = kind === 'chat' ? ChatResponseSchema.safeParse(data) : GenerateResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new InferenceError('Ollama response has no reply text', 'malformed', { cause: parsed.error });
    }

    const text = 'message' in parsed.data ? parsed.data.message.content : parsed.data.response;
    if (text.trim().length === 0) {
      throw new InferenceError('Ollama returned an empty reply', 'malformed');
    }
    return text;
  }
}

function isTransient(error: unknown): boolean {
  if (!(error instanceof InferenceError)) return false;
  return error.kind === 'connection' || error.kind === 'timeout' || (error.kind === 'http' && / 5\d\d$/.test(error.message));
}

/**
 * Settles with a cancellation error as soon as `signal` aborts.
 */
function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(new InferenceError('Request was cancelled', 'cancelled'));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new InferenceError('Request was cancelled', 'cancelled'));
    signal.addEventListener('abort', onAbort, { once: true });
    promise
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}
