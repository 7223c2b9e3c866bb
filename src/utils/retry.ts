/**
 * Retry and Circuit Breaker patterns for external calls (model service, pricing protocol)
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  initialDelayMs: 250,
  maxDelayMs: 2000,
  multiplier: 2,
  timeoutMs: 60000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  onLog?: (log: RetryLog) => void;
  /** Decides whether a failed attempt may be retried; defaults to always */
  shouldRetry?: (error: unknown) => boolean;
  /** Builds the error thrown when an attempt exceeds timeoutMs */
  onTimeout: (timeoutMs: number) => Error;
}

/**
 * Executes a function with exponential backoff retry logic.
 * The last error is rethrown unchanged so callers can classify it.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig,
  options: RetryOptions
): Promise<T> {
  const { onLog, shouldRetry = () => true, onTimeout } = options;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await withTimeout(fn(attempt), config.timeoutMs, onTimeout);
      onLog?.({ timestamp: new Date(), attempt, delay: 0, success: true });
      return result;
    } catch (error) {
      const canRetry = attempt < config.maxAttempts && shouldRetry(error);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: canRetry ? lastDelay : undefined,
      });

      if (!canRetry) {
        throw error;
      }

      await sleep(lastDelay);
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    }
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: (ms: number) => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout(timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Sleep utility function
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export class CircuitOpenError extends Error {
  constructor(public readonly retryInMs: number) {
    super(`Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${retryInMs}ms`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Circuit Breaker Pattern
 * Stops calling a service that keeps failing until resetTimeout has passed
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: Array<{ timestamp: Date; state: CircuitState; reason: string }> = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000
  ) {}

  /**
   * Execute function with circuit breaker protection.
   * Errors for which `countsAsFailure` returns false pass through without tripping the breaker.
   */
  async execute<T>(fn: () => Promise<T>, countsAsFailure: (error: unknown) => boolean = () => true): Promise<T> {
    if (this.state === 'open') {
      const elapsed = Date.now() - (this.lastFailureTime ?? Date.now());
      if (elapsed > this.resetTimeout) {
        this.state = 'half-open';
        this.successCount = 0;
        this.logStateChange('half-open', 'Reset timeout reached');
      } else {
        throw new CircuitOpenError(this.resetTimeout - elapsed);
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          this.state = 'closed';
          this.failureCount = 0;
          this.logStateChange('closed', 'Recovered from temporary failure');
        }
      } else {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      if (countsAsFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onFailure() {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      this.logStateChange('open', 'Failed while in half-open state');
    } else if (this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logStateChange('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private logStateChange(newState: CircuitState, reason: string) {
    this.logs.push({ timestamp: new Date(), state: newState, reason });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }

  getStats() {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime ? new Date(this.lastFailureTime) : null,
      logs: this.logs,
    };
  }
}
