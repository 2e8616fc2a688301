/**
 * Exchange Adapter Contract
 *
 * Every exchange the gateway can quote or trade on implements IExchange.
 * The aggregator and router depend only on this interface.
 */

/**
 * Supported exchanges. Declaration order is the priority order used to break price ties.
 */
export enum ExchangeId {
  BINANCE = 'Binance',
  BYBIT = 'Bybit',
}

/**
 * Order side as the gateway sees it; adapters translate it to their wire token
 */
export type OrderSide = 'Buy' | 'Sell';

export const ORDER_SIDES: readonly OrderSide[] = ['Buy', 'Sell'];

/**
 * Exchange-native price payload, not normalized
 */
export type RawPriceResponse = unknown;

/**
 * Exchange-native order payload, passed through to the caller unmodified
 */
export type OrderResult = Record<string, unknown>;

/**
 * Binance GET /api/v3/ticker/price
 */
export interface BinanceTickerPriceResponse {
  symbol: string;
  price: string;
}

/**
 * Bybit GET /v5/market/tickers
 */
export interface BybitTickersResponse {
  retCode: number;
  retMsg: string;
  result: {
    category?: string;
    list: Array<{
      symbol?: string;
      lastPrice: string | null;
      [field: string]: unknown;
    }>;
  };
  time?: number;
}

export interface IExchange {
  readonly id: ExchangeId;

  /**
   * Fetch the current price payload for a symbol
   * @throws TransportError | ProtocolError
   */
  getPrice(symbol: string): Promise<RawPriceResponse>;

  /**
   * Submit a signed market order
   * @throws TransportError | ProtocolError | SigningError
   */
  placeOrder(symbol: string, side: OrderSide, quantity: number): Promise<OrderResult>;
}

/**
 * Base class for failures raised by an adapter
 */
export class ExchangeError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly exchange?: ExchangeId,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ExchangeError';
  }
}

/**
 * Network failure or timeout; the exchange never answered
 */
export class TransportError extends ExchangeError {
  constructor(message: string, exchange?: ExchangeId, options?: ErrorOptions) {
    super(message, 'TRANSPORT_ERROR', exchange, options);
    this.name = 'TransportError';
  }
}

/**
 * The exchange answered with an error status or an unusable payload.
 * status is undefined when the client library reports only the exchange's message.
 */
export class ProtocolError extends ExchangeError {
  constructor(
    message: string,
    public readonly status: number | undefined,
    public readonly body: string,
    exchange?: ExchangeId,
    options?: ErrorOptions
  ) {
    super(message, 'PROTOCOL_ERROR', exchange, options);
    this.name = 'ProtocolError';
  }
}

/**
 * The request could not be authenticated
 */
export class SigningError extends ExchangeError {
  constructor(message: string, exchange?: ExchangeId, options?: ErrorOptions) {
    super(message, 'SIGNING_ERROR', exchange, options);
    this.name = 'SigningError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
