export class ScreenerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport, HTTP, payload or parse failure from a single provider. Retried, then failed over. */
export class ProviderError extends ScreenerError {
  constructor(
    public readonly providerId: string,
    public readonly symbol: string,
    message: string,
    cause?: unknown,
  ) {
    super(`[${providerId}] ${symbol}: ${message}`, { cause });
  }
}

/** Every configured provider failed for the symbol; `cause` is the last provider's error. */
export class DataUnavailableError extends ScreenerError {
  constructor(
    public readonly symbol: string,
    lastError: unknown,
  ) {
    super(`No data available for ${symbol}: ${errorMessage(lastError)}`, { cause: lastError });
  }
}

export class InsufficientHistoryError extends ScreenerError {}

export class NoTradingDayError extends ScreenerError {
  constructor(public readonly asOfDate: string) {
    super(`No benchmark trading day on or before ${asOfDate}`);
  }
}

export class AlignmentFailureError extends ScreenerError {}

export class ConfigurationError extends ScreenerError {
  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
