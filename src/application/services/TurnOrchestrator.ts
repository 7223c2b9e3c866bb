import type { Turn } from '../../core/entities/Conversation.js';
import { createTurn } from '../../core/entities/Conversation.js';
import type { DesignSnapshot } from '../../core/entities/Design.js';
import type { AlternativesResult, PricingResult } from '../../core/entities/Pricing.js';
import type { ModeConfig } from '../../core/entities/Settings.js';
import type { IInferenceClient } from '../../core/interfaces/IInferenceClient.js';
import { InferenceError, errorMessage } from '../../core/errors.js';
import { compileSystemPrompt } from '../../core/prompts/PromptCompiler.js';
import type { DebugLog } from '../../utils/logging.js';
import { logEvent } from '../../utils/logging.js';
import type { IntentPolicy } from './PricingIntent.js';
import {
  KeywordAlternativesIntent,
  KeywordPricingIntent,
  MAX_ALTERNATIVE_COMPONENTS,
  MAX_PRICED_COMPONENTS,
  selectAlternativeQueries,
  selectPricingQueries,
} from './PricingIntent.js';
import { DEFAULT_ALTERNATIVES_PER_PART } from './PricingService.js';
import type { PricingService } from './PricingService.js';
import type { Session } from './Session.js';

export interface TurnOrchestratorOptions {
  /** Longest the turn waits for pricing and alternatives before answering without them */
  pricingWaitMs: number;
  intent?: IntentPolicy;
  alternativesIntent?: IntentPolicy;
  maxPricedComponents?: number;
  alternativesPerPart?: number;
  now?: () => Date;
  debugLog?: DebugLog;
}

export interface HandleMessageOptions {
  design?: DesignSnapshot;
  /** Explicit "fetch pricing" action, independent of the message text */
  fetchPricing?: boolean;
  signal?: AbortSignal;
  /** Per-call limit for the model request */
  timeoutMs?: number;
  purpose?: 'chat' | 'review';
}

export interface AssistantReply {
  turn: Turn;
  mode: ModeConfig;
  /** Pricing that was included in the prompt */
  pricing: PricingResult[];
  /**
   * The lookup started for this turn had not landed when the reply was
   * produced; `pricing` then holds results accepted earlier, if any.
   */
  pricingPending: boolean;
  /** Replacement candidates that were included in the prompt */
  alternatives: AlternativesResult[];
  /** The alternatives search had not finished when the reply was produced */
  alternativesPending: boolean;
}

type Lookup<T> = { results: T[]; pending: boolean };

const NO_PRICING: Lookup<PricingResult> = { results: [], pending: false };
const NO_ALTERNATIVES: Lookup<AlternativesResult> = { results: [], pending: false };

export const PCB_REVIEW_REQUEST = 'Analyze this PCB layout and give design advice.';
export const SCHEMATIC_REVIEW_REQUEST = 'Analyze this schematic and give circuit design advice.';

/**
 * Runs one user turn: memory, pricing and alternatives lookups, prompt compilation, model call.
 */
export class TurnOrchestrator {
  private readonly intent: IntentPolicy;
  private readonly alternativesIntent: IntentPolicy;
  private readonly now: () => Date;
  private readonly debugLog: DebugLog;

  constructor(
    private readonly inference: IInferenceClient,
    private readonly pricing: PricingService,
    private readonly options: TurnOrchestratorOptions
  ) {
    this.intent = options.intent ?? new KeywordPricingIntent();
    this.alternativesIntent = options.alternativesIntent ?? new KeywordAlternativesIntent();
    this.now = options.now ?? (() => new Date());
    this.debugLog = options.debugLog ?? (() => undefined);
  }

  /**
   * Pricing and alternatives lookups run side by side within the same wait.
   * The user turn is appended before anything else and stays in memory even
   * when the model call fails. Model failures reject with InferenceError.
   */
  async handleUserMessage(text: string, session: Session, options: HandleMessageOptions = {}): Promise<AssistantReply> {
    session.context.append(createTurn('user', text, this.now()));

    const [lookup, candidates] = await Promise.all([
      this.lookupPricing(text, session, options),
      this.lookupAlternatives(text, session, options),
    ]);
    const mode = session.mode;
    const window = session.context.window();
    const systemPrompt = compileSystemPrompt({
      mode,
      window,
      snapshot: options.design,
      pricing: lookup.results,
      alternatives: candidates.results,
      purpose: options.purpose,
    });
    this.debugLog(`Compiled system prompt (${systemPrompt.length} chars, ${window.length} turns)`);

    let reply: string;
    try {
      reply = await this.inference.infer(systemPrompt, window, { signal: options.signal, timeoutMs: options.timeoutMs });
    } catch (error) {
      const failure =
        error instanceof InferenceError ? error : new InferenceError(errorMessage(error), 'malformed', { cause: error });
      logEvent({
        component: 'orchestrator',
        event: 'inference_failed',
        kind: failure.kind,
        error: failure.message,
        session: session.id,
        severity: 'HIGH',
      });
      throw failure;
    }

    if (options.signal?.aborted) {
      throw new InferenceError('Request was cancelled', 'cancelled');
    }

    const turn = createTurn('assistant', reply.trim(), this.now());
    session.context.append(turn);

    return {
      turn,
      mode,
      pricing: lookup.results,
      pricingPending: lookup.pending,
      alternatives: candidates.results,
      alternativesPending: candidates.pending,
    };
  }

  /**
   * Design review request for the session's analysis context
   */
  analyzeDesign(
    session: Session,
    design: DesignSnapshot,
    options: Omit<HandleMessageOptions, 'design' | 'purpose'> = {}
  ): Promise<AssistantReply> {
    const request = session.mode.analysis_context === 'schematic' ? SCHEMATIC_REVIEW_REQUEST : PCB_REVIEW_REQUEST;
    return this.handleUserMessage(request, session, { ...options, design, purpose: 'review' });
  }

  private async lookupPricing(
    text: string,
    session: Session,
    options: HandleMessageOptions
  ): Promise<Lookup<PricingResult>> {
    if (!options.fetchPricing && !this.intent.detect(text)) {
      return NO_PRICING;
    }

    const queries = selectPricingQueries(text, options.design, this.options.maxPricedComponents ?? MAX_PRICED_COMPONENTS);
    if (queries.length === 0) {
      this.debugLog('Pricing requested but the design has no components');
      return NO_PRICING;
    }

    const ticket = this.pricing.request(queries, session.config, session.pricing);
    const landed = await settleWithin(ticket.result, this.options.pricingWaitMs);
    if (landed === undefined) {
      const earlier = session.pricing.resultsFor(ticket.refs);
      this.debugLog(
        `Pricing generation ${ticket.generation} still pending after ${this.options.pricingWaitMs}ms; ${earlier.length} earlier result(s) used`
      );
      return { results: earlier, pending: true };
    }

    return { results: session.pricing.resultsFor(ticket.refs), pending: false };
  }

  private async lookupAlternatives(
    text: string,
    session: Session,
    options: HandleMessageOptions
  ): Promise<Lookup<AlternativesResult>> {
    if (!this.alternativesIntent.detect(text)) {
      return NO_ALTERNATIVES;
    }

    const queries = selectAlternativeQueries(text, options.design, MAX_ALTERNATIVE_COMPONENTS);
    if (queries.length === 0) {
      this.debugLog('Alternatives requested but no known component was named');
      return NO_ALTERNATIVES;
    }

    const search = this.pricing.alternatives(
      queries,
      session.config,
      this.options.alternativesPerPart ?? DEFAULT_ALTERNATIVES_PER_PART
    );
    const found = await settleWithin(search, this.options.pricingWaitMs);
    if (found === undefined) {
      this.debugLog(`Alternatives search still running after ${this.options.pricingWaitMs}ms`);
      return { results: [], pending: true };
    }
    return { results: found, pending: false };
  }
}

/** The settled value, or undefined once `ms` has passed */
async function settleWithin<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}
