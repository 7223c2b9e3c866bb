/**
 * Error taxonomy for the assistant core.
 *
 * Only InferenceError is meant to reach the user. Pricing errors are converted
 * to demo-tagged results at the pricing client boundary, and ConfigIOError is
 * reported by the settings surface while the previous settings stay in effect.
 */

export class ConfigIOError extends Error {
  constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigIOError';
  }
}

export class PricingTransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PricingTransportError';
  }
}

export class PricingProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PricingProtocolError';
  }
}

export type InferenceErrorKind =
  | 'connection'
  | 'timeout'
  | 'http'
  | 'malformed'
  | 'unavailable'
  | 'cancelled';

export class InferenceError extends Error {
  constructor(
    message: string,
    public readonly kind: InferenceErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InferenceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
