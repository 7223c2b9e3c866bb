import { z } from 'zod';
import type { AssistantReply } from '../../application/services/TurnOrchestrator.js';
import { InferenceError, errorMessage } from '../../core/errors.js';

export const MODEL_TIMEOUT_SHAPE = z
  .number()
  .int()
  .min(1000)
  .max(600000)
  .optional()
  .describe('Time limit for the model call in milliseconds (defaults to the server setting)');

export function textResult(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

export function errorResult(text: string) {
  return { isError: true, content: [{ type: 'text' as const, text }] };
}

/**
 * Reply text plus a provenance footer for any pricing or alternatives that were used.
 */
export function formatReply(reply: AssistantReply): string {
  const footer: string[] = [];
  const demo = reply.pricing.filter((result) => result.source === 'demo').map((result) => result.component_ref);
  const live = reply.pricing.filter((result) => result.source === 'live').map((result) => result.component_ref);

  if (live.length > 0) {
    footer.push(`💲 Live distributor pricing: ${live.join(', ')}`);
  }
  if (demo.length > 0) {
    footer.push(`⚠️ Demo pricing (synthetic estimates, not real prices): ${demo.join(', ')}`);
  }
  if (reply.pricingPending) {
    footer.push(
      reply.pricing.length > 0
        ? '⏳ A newer pricing lookup is still running; the figures above come from an earlier lookup.'
        : '⏳ Pricing did not arrive in time; ask again shortly to include it.'
    );
  }

  const liveAlternatives = reply.alternatives.filter((result) => result.source === 'live').map((r) => r.component_ref);
  const demoAlternatives = reply.alternatives.filter((result) => result.source === 'demo').map((r) => r.component_ref);
  if (liveAlternatives.length > 0) {
    footer.push(`🔁 Alternative parts from distributor search: ${liveAlternatives.join(', ')}`);
  }
  if (demoAlternatives.length > 0) {
    footer.push(`⚠️ Demo alternatives (invented placeholder parts, not real products): ${demoAlternatives.join(', ')}`);
  }
  if (reply.alternativesPending) {
    footer.push('⏳ The alternative part search did not finish in time.');
  }

  return footer.length > 0 ? `${reply.turn.content}\n\n---\n${footer.join('\n')}` : reply.turn.content;
}

/**
 * Mode-independent notice for a failed model call. The user's message stays in memory.
 */
export function inferenceFailureNotice(error: unknown): string {
  const reason =
    error instanceof InferenceError
      ? {
          connection: 'the language model service could not be reached',
          timeout: 'the language model took too long to answer',
          http: 'the language model service returned an error',
          malformed: 'the language model returned an unusable reply',
          unavailable: 'the language model service is temporarily unavailable',
          cancelled: 'the request was cancelled',
        }[error.kind]
      : 'an unexpected error occurred';

  return `The assistant could not answer because ${reason} (${errorMessage(error)}). Your message was kept; please try again.`;
}
