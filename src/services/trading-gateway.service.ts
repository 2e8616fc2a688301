/**
 * Trading Gateway
 *
 * One aggregator and one router sharing the same adapters.
 */
import type { IExchange, OrderResult } from '../exchanges/interface.js';
import { ExchangeFactory } from '../exchanges/factory.js';
import { TRADING_CONFIG, loadGatewayConfig, type GatewayConfig, type QuoteFailurePolicy } from '../config/index.js';
import type { Logger } from '../utils/logger.js';
import { QuoteAggregator, selectBestQuote } from './quote-aggregator.service.js';
import { OrderRouter } from './order-router.service.js';
import type { BestPriceResult, OrderRequest, PriceMode, Quote, QuoteSummary } from './types.js';

export interface TradingGatewayOptions {
  failurePolicy?: QuoteFailurePolicy;
  logger?: Logger;
}

export class TradingGateway {
  readonly aggregator: QuoteAggregator;
  readonly router: OrderRouter;

  constructor(exchanges: readonly IExchange[], options: TradingGatewayOptions = {}) {
    this.aggregator = new QuoteAggregator(exchanges, {
      failurePolicy: options.failurePolicy,
      logger: options.logger?.child('[QuoteAggregator]'),
    });
    this.router = new OrderRouter(this.aggregator, exchanges, {
      logger: options.logger?.child('[OrderRouter]'),
    });
  }

  /**
   * Build every supported adapter from configuration
   */
  static fromConfig(config: GatewayConfig, logger?: Logger): TradingGateway {
    return new TradingGateway(ExchangeFactory.createAll(config), {
      failurePolicy: config.quoteFailurePolicy,
      logger,
    });
  }

  getQuotes(symbol?: string): Promise<Quote[]> {
    return this.aggregator.getQuotes(symbol);
  }

  getBestPrice(symbol?: string, mode: PriceMode = 'lowest'): Promise<BestPriceResult> {
    return this.aggregator.getBestPrice(symbol, mode);
  }

  /**
   * One round of quotes with the lowest and highest picked from that same round
   * @throws NoQuotesAvailableError, or the adapter's own error under fail-fast
   */
  async getQuoteSummary(symbol?: string): Promise<QuoteSummary> {
    const quotes = await this.aggregator.getQuotes(symbol);
    const resolved = symbol ?? TRADING_CONFIG.DEFAULT_SYMBOL;

    return {
      symbol: resolved,
      quotes,
      lowest: selectBestQuote(resolved, quotes, 'lowest'),
      highest: selectBestQuote(resolved, quotes, 'highest'),
    };
  }

  placeOrder(request: OrderRequest): Promise<OrderResult> {
    return this.router.placeOrder(request);
  }
}

export function createTradingGateway(config: GatewayConfig = loadGatewayConfig()): TradingGateway {
  return TradingGateway.fromConfig(config);
}
