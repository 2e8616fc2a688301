export * from './exchanges/index.js';

export {
  QuoteAggregator,
  createQuoteAggregator,
  selectBestQuote,
} from './services/quote-aggregator.service.js';
export type { QuoteAggregatorOptions } from './services/quote-aggregator.service.js';
export {
  OrderRouter,
  createOrderRouter,
  parseOrderSide,
  priceModeFor,
  validateQuantity,
} from './services/order-router.service.js';
export type { BestPriceSource, OrderRouterOptions } from './services/order-router.service.js';
export { TradingGateway, createTradingGateway } from './services/trading-gateway.service.js';
export type { TradingGatewayOptions } from './services/trading-gateway.service.js';
export {
  PRICE_EXTRACTORS,
  extractBinancePrice,
  extractBybitPrice,
  normalizeQuote,
  parsePrice,
} from './services/quote-normalizer.js';
export type { PriceExtractor } from './services/quote-normalizer.js';
export {
  GatewayError,
  InvalidExchangeError,
  InvalidQuantityError,
  InvalidSideError,
  NoQuotesAvailableError,
} from './services/errors.js';
export { PRICE_MODES } from './services/types.js';
export type {
  BestPriceResult,
  OrderRequest,
  PriceMode,
  Quote,
  QuoteFailure,
  QuoteSummary,
} from './services/types.js';

export { TRADING_CONFIG, loadGatewayConfig, validateConfig } from './config/index.js';
export type {
  BinanceConfig,
  BinancePrivateKeyAlgo,
  BybitCategory,
  BybitConfig,
  GatewayConfig,
  QuoteFailurePolicy,
} from './config/index.js';

export { Logger, LogLevel, createLogger, logger } from './utils/logger.js';
