/**
 * Base class for errors raised by the rates package
 */
export class RatesError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad caller input: unsupported currency, malformed or out-of-window date, bad amount
 */
export class RateValidationError extends RatesError {}

/**
 * The repository answered but the requested target was not in the result
 */
export class RateNotFoundError extends RatesError {}

/**
 * The upstream provider failed (transport error after retries, or a non-2xx answer)
 */
export class UpstreamError extends RatesError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class LockTimeoutError extends RatesError {
  constructor(
    readonly key: string,
    readonly waitedMs: number,
  ) {
    super(`timeout acquiring lock ${key} after ${waitedMs}ms`);
  }
}

export class StoreTimeoutError extends RatesError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
