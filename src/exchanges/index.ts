/**
 * Exchanges Module
 *
 * Adapter contract, error taxonomy and the Binance and Bybit implementations.
 */

export type {
  IExchange,
  OrderSide,
  OrderResult,
  RawPriceResponse,
  BinanceTickerPriceResponse,
  BybitTickersResponse,
} from './interface.js';
export {
  ExchangeId,
  ORDER_SIDES,
  ExchangeError,
  TransportError,
  ProtocolError,
  SigningError,
} from './interface.js';

export { ExchangeFactory, createExchanges } from './factory.js';

export { BinanceExchange, createBinanceExchange, loadPrivateKey } from './binance/exchange.js';
export type { BinanceSpotClient } from './binance/exchange.js';
export { BybitExchange, createBybitExchange } from './bybit/exchange.js';
