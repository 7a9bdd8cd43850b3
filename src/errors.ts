/**
 * Error taxonomy for the price check pipeline.
 *
 * Per-product conditions that the pipeline expects (budget exhausted, no price
 * found, duplicate alert) are returned as results; these classes carry the
 * failures that cross a component boundary and end up as `errorKind` in the
 * run summary.
 */

export type ErrorKind =
  | 'TransientIOError'
  | 'ProviderError'
  | 'BudgetExceeded'
  | 'ExtractionFailed'
  | 'PersistenceError'
  | 'ChannelDeliveryError'
  | 'ConfigError';

export abstract class PriceWatchError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network failure, timeout, throttling or a 5xx answer. Safe to retry.
 */
export class TransientIOError extends PriceWatchError {
  readonly kind = 'TransientIOError';

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A provider rejected the request (4xx, malformed answer). Retrying will not help.
 */
export class ProviderError extends PriceWatchError {
  readonly kind = 'ProviderError';

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PersistenceError extends PriceWatchError {
  readonly kind = 'PersistenceError';
}

export class ChannelDeliveryError extends PriceWatchError {
  readonly kind = 'ChannelDeliveryError';

  constructor(
    public readonly channel: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigError extends PriceWatchError {
  readonly kind = 'ConfigError';
}

export function isTransient(error: unknown): boolean {
  return error instanceof TransientIOError;
}

/**
 * Error kind for the run summary. Unknown throws count as persistence or
 * provider failures depending on where they were caught, so callers pass a fallback.
 */
export function errorKindOf(error: unknown, fallback: ErrorKind): ErrorKind {
  return error instanceof PriceWatchError ? error.kind : fallback;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
