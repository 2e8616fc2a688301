/**
 * Order Router
 *
 * Validate → resolve exchange → dispatch. Exactly one exchange receives
 * exactly one order per call; nothing is retried or split.
 */
import { ExchangeId, IExchange, ORDER_SIDES, OrderResult, OrderSide } from '../exchanges/interface.js';
import { TRADING_CONFIG } from '../config/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { InvalidExchangeError, InvalidQuantityError, InvalidSideError } from './errors.js';
import type { BestPriceResult, OrderRequest, PriceMode } from './types.js';

/**
 * What the router needs from the aggregator
 */
export interface BestPriceSource {
  getBestPrice(symbol: string, mode: PriceMode): Promise<BestPriceResult>;
}

export interface OrderRouterOptions {
  logger?: Logger;
}

/**
 * Normalize a caller-supplied side ("buy", "BUY", "Buy") to OrderSide
 * @throws InvalidSideError
 */
export function parseOrderSide(value: unknown): OrderSide {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    const side = ORDER_SIDES.find((candidate) => candidate.toLowerCase() === normalized);
    if (side) return side;
  }
  throw new InvalidSideError(value);
}

/**
 * @throws InvalidQuantityError unless quantity is a finite number above zero
 */
export function validateQuantity(quantity: unknown): number {
  if (typeof quantity !== 'number' || !Number.isFinite(quantity) || quantity <= 0) {
    throw new InvalidQuantityError(quantity);
  }
  return quantity;
}

/**
 * Buy at the cheapest venue, sell at the richest
 */
export function priceModeFor(side: OrderSide): PriceMode {
  return side === 'Buy' ? 'lowest' : 'highest';
}

export class OrderRouter {
  private readonly exchanges = new Map<ExchangeId, IExchange>();
  private readonly logger: Logger;

  constructor(
    private readonly quotes: BestPriceSource,
    exchanges: readonly IExchange[],
    options: OrderRouterOptions = {}
  ) {
    for (const exchange of exchanges) {
      this.exchanges.set(exchange.id, exchange);
    }
    this.logger = options.logger ?? createLogger({ prefix: '[OrderRouter]' });
  }

  /**
   * Place a market order, choosing the exchange by best price when none is given
   * @throws InvalidSideError | InvalidQuantityError | InvalidExchangeError before any order is sent;
   *         NoQuotesAvailableError or adapter errors unchanged
   */
  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    const side = parseOrderSide(request.side);
    const quantity = validateQuantity(request.quantity);
    const symbol = request.symbol ?? TRADING_CONFIG.DEFAULT_SYMBOL;

    let target: unknown;
    if (request.exchange === undefined || request.exchange === null) {
      const best = await this.quotes.getBestPrice(symbol, priceModeFor(side));
      this.logger.info(`Best ${side} venue for ${symbol}: ${best.exchange} at ${best.price}`);
      target = best.exchange;
    } else {
      target = request.exchange;
    }

    const exchange = this.resolveExchange(target);

    try {
      const order = await exchange.placeOrder(symbol, side, quantity);
      this.logger.info(`Order placed successfully on ${exchange.id}:`, order);
      return order;
    } catch (error) {
      this.logger.error(`Error placing order on ${exchange.id}:`, error);
      throw error;
    }
  }

  /**
   * Case-insensitive lookup among the registered exchanges
   * @throws InvalidExchangeError
   */
  resolveExchange(name: unknown): IExchange {
    if (typeof name !== 'string') {
      throw new InvalidExchangeError(String(name), [...this.exchanges.keys()]);
    }

    const normalized = name.trim().toLowerCase();

    for (const [id, exchange] of this.exchanges) {
      if (id.toLowerCase() === normalized) {
        return exchange;
      }
    }

    throw new InvalidExchangeError(name, [...this.exchanges.keys()]);
  }
}

export function createOrderRouter(
  quotes: BestPriceSource,
  exchanges: readonly IExchange[],
  options?: OrderRouterOptions
): OrderRouter {
  return new OrderRouter(quotes, exchanges, options);
}
