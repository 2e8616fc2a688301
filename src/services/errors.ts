/**
 * Errors raised by the gateway itself, before or instead of an adapter call
 */
import type { QuoteFailure } from './types.js';

export class GatewayError extends Error {
  constructor(message: string, public readonly code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

export class InvalidSideError extends GatewayError {
  constructor(public readonly side: unknown) {
    super(`Invalid side: ${String(side)}. Side must be either 'Buy' or 'Sell'.`, 'INVALID_SIDE');
    this.name = 'InvalidSideError';
  }
}

export class InvalidExchangeError extends GatewayError {
  constructor(public readonly exchange: string, supported: readonly string[]) {
    super(`Invalid exchange name: ${exchange}. Use one of: ${supported.join(', ')}.`, 'INVALID_EXCHANGE');
    this.name = 'InvalidExchangeError';
  }
}

export class InvalidQuantityError extends GatewayError {
  constructor(public readonly quantity: unknown) {
    super(`Invalid quantity: ${String(quantity)}. Quantity must be a positive number.`, 'INVALID_QUANTITY');
    this.name = 'InvalidQuantityError';
  }
}

export class NoQuotesAvailableError extends GatewayError {
  constructor(
    public readonly symbol: string,
    public readonly failures: readonly QuoteFailure[] = []
  ) {
    super(`No exchange returned a usable price for ${symbol}`, 'NO_QUOTES_AVAILABLE');
    this.name = 'NoQuotesAvailableError';
  }
}
