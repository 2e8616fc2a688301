/**
 * Gateway data model
 */
import type { ExchangeId } from '../exchanges/interface.js';

/**
 * Which end of the quote set wins: lowest for buying, highest for selling
 */
export type PriceMode = 'lowest' | 'highest';

export const PRICE_MODES: readonly PriceMode[] = ['lowest', 'highest'];

/**
 * One exchange's price for a symbol at query time; null when the response carried no usable price
 */
export interface Quote {
  readonly exchange: ExchangeId;
  readonly price: number | null;
}

export interface BestPriceResult {
  readonly price: number;
  readonly exchange: ExchangeId;
}

/**
 * Quotes from a single round plus the best venue for each side
 */
export interface QuoteSummary {
  readonly symbol: string;
  readonly quotes: readonly Quote[];
  readonly lowest: BestPriceResult;
  readonly highest: BestPriceResult;
}

/**
 * Order placement input. side and exchange are raw caller strings,
 * validated and normalized by the router.
 */
export interface OrderRequest {
  side: string;
  quantity: number;
  /** Defaults to TRADING_CONFIG.DEFAULT_SYMBOL */
  symbol?: string;
  /** Destination exchange; resolved from the best price when absent or null */
  exchange?: string | null;
}

/**
 * An adapter call that failed while the aggregator was degrading
 */
export interface QuoteFailure {
  exchange: ExchangeId;
  error: unknown;
}
