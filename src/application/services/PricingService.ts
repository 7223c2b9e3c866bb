import type {
  AlternativesResult,
  PricingOutcome,
  PricingQuery,
  PricingResult,
  QuotedPart,
} from '../../core/entities/Pricing.js';
import type { Config } from '../../core/entities/Settings.js';
import { MAX_GATEWAY_BATCH } from '../../core/interfaces/IPricingGateway.js';
import type { GatewayCallOptions, IPricingGateway } from '../../core/interfaces/IPricingGateway.js';
import { PricingTransportError, errorMessage } from '../../core/errors.js';
import { withRetry } from '../../utils/retry.js';
import type { DebugLog } from '../../utils/logging.js';
import { logEvent } from '../../utils/logging.js';
import { DEFAULT_DISTRIBUTOR_PRIORITY, selectBestOffer } from './OfferSelection.js';
import type { PricingLedger } from './PricingLedger.js';
import { SyntheticPricing } from './SyntheticPricing.js';

export interface PricingServiceOptions {
  /** Per-attempt bound on a pricing protocol call */
  timeoutMs: number;
  distributorPriority?: readonly string[];
  synthetic?: SyntheticPricing;
  debugLog?: DebugLog;
}

export interface PricingTicket {
  generation: number;
  refs: string[];
  /** Resolves with the results that were still current when they arrived. Never rejects. */
  result: Promise<PricingResult[]>;
}

const RETRY_DELAY_MS = 100;

export const DEFAULT_ALTERNATIVES_PER_PART = 3;

type GatewayReply<T> =
  | { kind: 'unavailable'; reason: string }
  | { kind: 'answered'; parts: T[]; failure?: Error }
  | { kind: 'failed'; error: Error };

/**
 * Pricing client.
 *
 * Uses the pricing protocol when a credential is configured and demo mode is
 * off; otherwise, or when the call fails, every component gets a synthetic
 * quote tagged `demo`. Batches larger than the protocol takes are split, and
 * components of a failed batch get demo quotes. `quote` never rejects.
 */
export class PricingService {
  private readonly priority: readonly string[];
  private readonly synthetic: SyntheticPricing;
  private readonly debugLog: DebugLog;

  constructor(
    private readonly gateway: IPricingGateway | undefined,
    private readonly options: PricingServiceOptions
  ) {
    this.priority = options.distributorPriority ?? DEFAULT_DISTRIBUTOR_PRIORITY;
    this.synthetic = options.synthetic ?? new SyntheticPricing();
    this.debugLog = options.debugLog ?? (() => undefined);
  }

  get hasGateway(): boolean {
    return this.gateway !== undefined;
  }

  async quote(queries: readonly PricingQuery[], config: Config, signal?: AbortSignal): Promise<PricingResult[]> {
    const unique = dedupe(queries);
    if (unique.length === 0) return [];

    const outcome = await this.fetch(unique, config, signal);
    switch (outcome.kind) {
      case 'live':
        this.debugLog(`Live pricing for ${outcome.results.length} component(s)`);
        return outcome.results;
      case 'demo':
        this.debugLog(`Demo pricing for ${outcome.results.length} component(s): ${outcome.reason}`);
        return outcome.results;
      case 'failed':
        logEvent({
          component: 'pricing',
          event: signal?.aborted ? 'pricing_request_superseded' : 'pricing_degraded_to_demo',
          error: outcome.error.message,
          components: unique.length,
          severity: signal?.aborted ? 'LOW' : 'MEDIUM',
        });
        return unique.map((query) => this.demoResult(query));
    }
  }

  /**
   * Start a quote tracked by the session's ledger. Results for components
   * requested again before this one lands are dropped.
   */
  request(queries: readonly PricingQuery[], config: Config, ledger: PricingLedger): PricingTicket {
    const refs = dedupe(queries).map((query) => query.component_ref);
    const { generation, signal } = ledger.begin(refs);

    const result = this.quote(queries, config, signal).then(
      (results) => ledger.accept(generation, results),
      (error: unknown) => {
        ledger.settle(generation);
        logEvent({ component: 'pricing', event: 'pricing_request_failed', error: errorMessage(error), severity: 'MEDIUM' });
        return [];
      }
    );

    return { generation, refs, result };
  }

  /**
   * Replacement candidates per component, live when the pricing protocol is
   * usable and synthetic (tagged `demo`) otherwise. Never rejects.
   */
  async alternatives(
    queries: readonly PricingQuery[],
    config: Config,
    limit: number = DEFAULT_ALTERNATIVES_PER_PART,
    signal?: AbortSignal
  ): Promise<AlternativesResult[]> {
    const unique = dedupe(queries);
    if (unique.length === 0) return [];

    const reply = await this.callGateway(unique, config, signal, (gateway, batch, options) =>
      gateway.fetchAlternatives(batch, limit, options)
    );

    switch (reply.kind) {
      case 'unavailable':
        this.debugLog(`Demo alternatives for ${unique.length} component(s): ${reply.reason}`);
        return unique.map((query) => this.demoAlternatives(query, limit));
      case 'failed':
        logEvent({
          component: 'pricing',
          event: 'alternatives_degraded_to_demo',
          error: reply.error.message,
          components: unique.length,
          severity: signal?.aborted ? 'LOW' : 'MEDIUM',
        });
        return unique.map((query) => this.demoAlternatives(query, limit));
      case 'answered': {
        this.logPartialFailure('alternatives', reply.failure, unique.length);
        const byRef = new Map(reply.parts.map((part) => [part.component_ref, part]));
        return unique.map((query): AlternativesResult => {
          const part = byRef.get(query.component_ref);
          return part
            ? { component_ref: query.component_ref, alternatives: part.alternatives.slice(0, limit), source: 'live' }
            : this.demoAlternatives(query, limit);
        });
      }
    }
  }

  private async fetch(queries: PricingQuery[], config: Config, signal?: AbortSignal): Promise<PricingOutcome> {
    const reply = await this.callGateway(queries, config, signal, (gateway, batch, options) =>
      gateway.fetchOffers(batch, options)
    );

    switch (reply.kind) {
      case 'unavailable':
        return { kind: 'demo', results: queries.map((query) => this.demoResult(query)), reason: reply.reason };
      case 'failed':
        return { kind: 'failed', error: reply.error };
      case 'answered':
        this.logPartialFailure('pricing', reply.failure, queries.length);
        return { kind: 'live', results: this.mergeLive(queries, reply.parts) };
    }
  }

  /**
   * One retried gateway call per batch of at most MAX_GATEWAY_BATCH
   * components. Fails only when every batch failed.
   */
  private async callGateway<T>(
    queries: PricingQuery[],
    config: Config,
    signal: AbortSignal | undefined,
    call: (gateway: IPricingGateway, batch: PricingQuery[], options: GatewayCallOptions) => Promise<T[]>
  ): Promise<GatewayReply<T>> {
    const apiKey = config.api_key;
    const gateway = this.gateway;

    if (config.demo_mode || !apiKey) {
      return { kind: 'unavailable', reason: config.demo_mode ? 'demo mode enabled' : 'no pricing credential' };
    }
    if (!gateway) {
      return { kind: 'unavailable', reason: 'no pricing server configured' };
    }

    const settled = await Promise.allSettled(
      chunk(queries, MAX_GATEWAY_BATCH).map((batch) =>
        withRetry(
          () => call(gateway, batch, { apiKey, signal }),
          {
            maxAttempts: 2,
            initialDelayMs: RETRY_DELAY_MS,
            maxDelayMs: RETRY_DELAY_MS,
            multiplier: 1,
            timeoutMs: this.options.timeoutMs,
          },
          {
            shouldRetry: (error) => error instanceof PricingTransportError && !signal?.aborted,
            onTimeout: (ms) => new PricingTransportError(`Pricing call timed out after ${ms}ms`),
            onLog: (log) => {
              if (!log.success) this.debugLog(`Pricing attempt ${log.attempt} failed: ${log.error}`);
            },
          }
        )
      )
    );

    const parts: T[] = [];
    const errors: Error[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        parts.push(...outcome.value);
      } else {
        errors.push(outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason)));
      }
    }

    const [firstError] = errors;
    if (firstError && errors.length === settled.length) {
      return { kind: 'failed', error: firstError };
    }
    return { kind: 'answered', parts, failure: firstError };
  }

  private logPartialFailure(what: 'pricing' | 'alternatives', failure: Error | undefined, components: number): void {
    if (!failure) return;
    logEvent({
      component: 'pricing',
      event: `${what}_partially_degraded`,
      error: failure.message,
      components,
      severity: 'MEDIUM',
    });
  }

  private mergeLive(queries: readonly PricingQuery[], parts: readonly QuotedPart[]): PricingResult[] {
    const byRef = new Map(parts.map((part) => [part.component_ref, part]));

    return queries.map((query) => {
      const part = byRef.get(query.component_ref);
      if (!part) {
        // Parts the server did not answer for still get a (demo) price.
        return this.demoResult(query);
      }
      return {
        component_ref: query.component_ref,
        offers: part.offers,
        best_offer: selectBestOffer(part.offers, this.priority),
        source: 'live',
      };
    });
  }

  private demoAlternatives(query: PricingQuery, limit: number): AlternativesResult {
    return { ...this.synthetic.alternatives(query, limit), source: 'demo' };
  }

  private demoResult(query: PricingQuery): PricingResult {
    const { offers } = this.synthetic.quote(query);
    return {
      component_ref: query.component_ref,
      offers,
      best_offer: selectBestOffer(offers, this.priority),
      source: 'demo',
    };
  }
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

function dedupe(queries: readonly PricingQuery[]): PricingQuery[] {
  const seen = new Set<string>();
  return queries.filter((query) => {
    if (seen.has(query.component_ref)) return false;
    seen.add(query.component_ref);
    return true;
  });
}
