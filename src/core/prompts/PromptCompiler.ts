import type { Turn } from '../entities/Conversation.js';
import type { DesignSnapshot } from '../entities/Design.js';
import type { AlternativesResult, PricingResult } from '../entities/Pricing.js';
import type { ModeConfig } from '../entities/Settings.js';
import { ModeFactory } from '../modes/ModeFactory.js';
import { LANGUAGES } from '../modes/languages.js';
import { formatAlternativesSection } from './AlternativesSection.js';
import { buildDesignDigest } from './DesignDigest.js';
import { formatPricingSection } from './PricingSection.js';
import { contextHeading, personaFor } from './personas.js';

const MODIFICATION_PATTERN =
  /\b(remove|delete|change|modify|replace|move|update|swap|reroute|rotate|resize)\b/i;

export interface CompileInput {
  mode: ModeConfig;
  window: readonly Turn[];
  snapshot?: DesignSnapshot;
  pricing?: readonly PricingResult[];
  alternatives?: readonly AlternativesResult[];
  purpose?: 'chat' | 'review';
}

export function mentionsModification(text: string): boolean {
  return MODIFICATION_PATTERN.test(text);
}

/**
 * Build the system prompt for one turn.
 *
 * Pure: the output depends only on the input, so identical inputs give
 * byte-identical prompts.
 */
export function compileSystemPrompt(input: CompileInput): string {
  const { mode, window, snapshot, pricing, alternatives } = input;
  const purpose = input.purpose ?? 'chat';
  const language = LANGUAGES[mode.language];
  const latestUser = [...window].reverse().find((turn) => turn.role === 'user');

  const sections = [
    `LANGUAGE: ${language.name} (${mode.language}). ${language.instruction}`,
    personaFor(mode.analysis_context, purpose),
    ModeFactory.getStrategy(mode.interaction_mode).compileSection({
      modificationRequested: latestUser !== undefined && mentionsModification(latestUser.content),
      purpose,
    }),
    conversationNote(window),
    `${contextHeading(mode.analysis_context)}:\n${buildDesignDigest(snapshot)}`,
  ];

  if (pricing && pricing.length > 0) {
    sections.push(formatPricingSection(pricing));
  }
  if (alternatives && alternatives.length > 0) {
    sections.push(formatAlternativesSection(alternatives));
  }

  sections.push(`REMEMBER: reply in ${language.name}.`);

  return sections.join('\n\n');
}

function conversationNote(window: readonly Turn[]): string {
  const last = window[window.length - 1];
  const earlier = last && last.role === 'user' ? window.length - 1 : window.length;

  if (earlier === 0) {
    return 'This is the start of the conversation.';
  }
  return (
    `The chat history holds ${earlier} earlier message${earlier === 1 ? '' : 's'} in chronological order. ` +
    'Build on earlier topics when relevant.'
  );
}
