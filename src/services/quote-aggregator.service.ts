/**
 * Quote Aggregator
 *
 * Asks every registered exchange for a price, normalizes the answers and
 * picks the lowest or highest one.
 */
import type { ExchangeId, IExchange } from '../exchanges/interface.js';
import { TRADING_CONFIG, type QuoteFailurePolicy } from '../config/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { NoQuotesAvailableError } from './errors.js';
import { PRICE_EXTRACTORS, normalizeQuote, type PriceExtractor } from './quote-normalizer.js';
import type { BestPriceResult, PriceMode, Quote, QuoteFailure } from './types.js';

export interface QuoteAggregatorOptions {
  /**
   * fail-fast (default): any adapter error aborts the whole query.
   * degrade: a failed adapter counts as having no price; fails only when every adapter fails.
   */
  failurePolicy?: QuoteFailurePolicy;
  extractors?: Record<ExchangeId, PriceExtractor>;
  logger?: Logger;
}

/**
 * Pick the best of a quote set. Comparison is strict, so on equal prices the
 * earlier quote wins and ordering of the input decides ties.
 * @throws NoQuotesAvailableError when no quote carries a price
 */
export function selectBestQuote(
  symbol: string,
  quotes: readonly Quote[],
  mode: PriceMode,
  failures: readonly QuoteFailure[] = []
): BestPriceResult {
  let best: BestPriceResult | null = null;

  for (const quote of quotes) {
    if (quote.price === null) continue;

    const better = best === null
      || (mode === 'lowest' ? quote.price < best.price : quote.price > best.price);

    if (better) {
      best = { price: quote.price, exchange: quote.exchange };
    }
  }

  if (best === null) {
    throw new NoQuotesAvailableError(symbol, failures);
  }
  return best;
}

export class QuoteAggregator {
  private readonly exchanges: readonly IExchange[];
  private readonly failurePolicy: QuoteFailurePolicy;
  private readonly extractors: Record<ExchangeId, PriceExtractor>;
  private readonly logger: Logger;

  /**
   * @param exchanges Adapters in priority order; the first one wins price ties
   */
  constructor(exchanges: readonly IExchange[], options: QuoteAggregatorOptions = {}) {
    const ids = exchanges.map((exchange) => exchange.id);
    if (new Set(ids).size !== ids.length) {
      throw new Error(`Duplicate exchange registration: ${ids.join(', ')}`);
    }

    this.exchanges = [...exchanges];
    this.failurePolicy = options.failurePolicy ?? 'fail-fast';
    this.extractors = options.extractors ?? PRICE_EXTRACTORS;
    this.logger = options.logger ?? createLogger({ prefix: '[QuoteAggregator]' });
  }

  getExchangeIds(): ExchangeId[] {
    return this.exchanges.map((exchange) => exchange.id);
  }

  getFailurePolicy(): QuoteFailurePolicy {
    return this.failurePolicy;
  }

  /**
   * Query every exchange concurrently. Quotes come back in registration order.
   */
  async getQuotes(symbol: string = TRADING_CONFIG.DEFAULT_SYMBOL): Promise<Quote[]> {
    const { quotes } = await this.collect(symbol);
    return quotes;
  }

  /**
   * Best price across exchanges: lowest for buying, highest for selling
   * @throws NoQuotesAvailableError, or the adapter's own error under fail-fast
   */
  async getBestPrice(
    symbol: string = TRADING_CONFIG.DEFAULT_SYMBOL,
    mode: PriceMode = 'lowest'
  ): Promise<BestPriceResult> {
    const { quotes, failures } = await this.collect(symbol);
    const best = selectBestQuote(symbol, quotes, mode, failures);

    this.logger.debug(`Best ${mode} price for ${symbol}: ${best.price} on ${best.exchange}`);
    return best;
  }

  private async collect(symbol: string): Promise<{ quotes: Quote[]; failures: QuoteFailure[] }> {
    if (this.failurePolicy === 'degrade') {
      return this.collectSettled(symbol);
    }

    try {
      const quotes = await Promise.all(
        this.exchanges.map(async (exchange) =>
          normalizeQuote(exchange.id, await exchange.getPrice(symbol), this.extractors)
        )
      );
      return { quotes, failures: [] };
    } catch (error) {
      this.logger.error(`Error fetching prices for ${symbol}:`, error);
      throw error;
    }
  }

  private async collectSettled(symbol: string): Promise<{ quotes: Quote[]; failures: QuoteFailure[] }> {
    const results = await Promise.allSettled(
      this.exchanges.map((exchange) => exchange.getPrice(symbol))
    );

    const quotes: Quote[] = [];
    const failures: QuoteFailure[] = [];

    results.forEach((result, index) => {
      const exchange = this.exchanges[index].id;

      if (result.status === 'fulfilled') {
        quotes.push(normalizeQuote(exchange, result.value, this.extractors));
        return;
      }

      this.logger.warn(`Skipping ${exchange} quote for ${symbol}:`, result.reason);
      failures.push({ exchange, error: result.reason });
      quotes.push({ exchange, price: null });
    });

    if (failures.length === this.exchanges.length) {
      throw new NoQuotesAvailableError(symbol, failures);
    }

    return { quotes, failures };
  }
}

export function createQuoteAggregator(
  exchanges: readonly IExchange[],
  options?: QuoteAggregatorOptions
): QuoteAggregator {
  return new QuoteAggregator(exchanges, options);
}
