import type { PricingResult } from '../../core/entities/Pricing.js';

export interface PricingRequestHandle {
  generation: number;
  signal: AbortSignal;
}

interface PendingRequest {
  refs: readonly string[];
  controller: AbortController;
}

/**
 * Tracks which pricing request is the newest for each component.
 *
 * Every request gets a generation number. A result is kept only if its
 * generation is still the latest requested for that component, so an older
 * response never overwrites a newer one. A request whose components have all
 * been requested again is aborted.
 */
export class PricingLedger {
  private nextGeneration = 1;
  private readonly latestRequested = new Map<string, number>();
  private readonly accepted = new Map<string, PricingResult>();
  private readonly pending = new Map<number, PendingRequest>();

  begin(refs: readonly string[]): PricingRequestHandle {
    const generation = this.nextGeneration++;
    for (const ref of refs) {
      this.latestRequested.set(ref, generation);
    }

    const controller = new AbortController();
    this.pending.set(generation, { refs, controller });
    this.abortSuperseded();

    return { generation, signal: controller.signal };
  }

  /**
   * Store the results that are still current for `generation` and return them.
   */
  accept(generation: number, results: readonly PricingResult[]): PricingResult[] {
    this.pending.delete(generation);

    const applied: PricingResult[] = [];
    for (const result of results) {
      if (this.latestRequested.get(result.component_ref) === generation) {
        this.accepted.set(result.component_ref, result);
        applied.push(result);
      }
    }
    return applied;
  }

  /** Forget a request that ended without results */
  settle(generation: number): void {
    this.pending.delete(generation);
  }

  resultsFor(refs: readonly string[]): PricingResult[] {
    return refs.map((ref) => this.accepted.get(ref)).filter((r): r is PricingResult => r !== undefined);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  clear(): void {
    for (const { controller } of this.pending.values()) {
      controller.abort();
    }
    this.pending.clear();
    this.latestRequested.clear();
    this.accepted.clear();
  }

  private abortSuperseded(): void {
    for (const [generation, request] of this.pending) {
      if (request.refs.every((ref) => this.latestRequested.get(ref) !== generation)) {
        request.controller.abort();
        this.pending.delete(generation);
      }
    }
  }
}
