/**
 * Errors that can occur during security data and exchange rate lookups
 */

/**
 * Base class for every provider failure. Consumers that only need to know
 * whether data is available can treat any ProviderError as "absent".
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * The query itself is invalid or could not be sent
 */
export class RequestError extends ProviderError {
  constructor(message: string, provider: string) {
    super(message, provider);
    this.name = 'RequestError';
  }
}

/**
 * The provider has no data for the requested security or currency pair
 */
export class DataNotFoundError extends ProviderError {
  constructor(message: string, provider: string) {
    super(message, provider);
    this.name = 'DataNotFoundError';
  }
}

/**
 * A cache-only lookup found nothing. Expected when running offline, so it is
 * not worth a warning.
 */
export class CacheMissError extends ProviderError {
  constructor(message: string, provider: string) {
    super(message, provider);
    this.name = 'CacheMissError';
  }
}
