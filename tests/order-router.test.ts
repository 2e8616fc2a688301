/**
 * OrderRouter tests
 *
 * Run: npm test -- tests/order-router.test.ts
 *
 * Coverage:
 *   - Side, quantity and exchange validation before any call
 *   - Explicit dispatch to exactly one exchange
 *   - Auto-resolution: lowest for Buy, highest for Sell
 *   - Error propagation from the aggregator and adapters
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ExchangeId, SigningError } from '../src/exchanges/interface.js';
import {
  OrderRouter,
  parseOrderSide,
  priceModeFor,
  validateQuantity,
  type BestPriceSource,
} from '../src/services/order-router.service.js';
import { QuoteAggregator } from '../src/services/quote-aggregator.service.js';
import {
  InvalidExchangeError,
  InvalidQuantityError,
  InvalidSideError,
  NoQuotesAvailableError,
} from '../src/services/errors.js';
import type { BestPriceResult, PriceMode } from '../src/services/types.js';
import { binanceTicker, bybitTickers, createFakeExchange, quietLogger } from './helpers/fakes.js';

function bestPriceSource(result: BestPriceResult | Error) {
  return {
    getBestPrice: vi.fn(async (_symbol: string, _mode: PriceMode): Promise<BestPriceResult> => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

describe('OrderRouter', () => {
  let binance: ReturnType<typeof createFakeExchange>;
  let bybit: ReturnType<typeof createFakeExchange>;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    binance = createFakeExchange(ExchangeId.BINANCE, { order: { orderId: '12345' } });
    bybit = createFakeExchange(ExchangeId.BYBIT, { order: { orderId: '54321' } });
  });

  function routerWith(source: BestPriceSource): OrderRouter {
    return new OrderRouter(source, [binance, bybit], { logger: quietLogger() });
  }

  it('places a Buy order on the explicit exchange only', async () => {
    const source = bestPriceSource(new Error('should not be called'));
    const router = routerWith(source);

    const result = await router.placeOrder({ side: 'Buy', quantity: 0.001, exchange: 'Binance' });

    expect(result).toEqual({ orderId: '12345' });
    expect(binance.placeOrder).toHaveBeenCalledTimes(1);
    expect(binance.placeOrder).toHaveBeenCalledWith('BTCUSDT', 'Buy', 0.001);
    expect(bybit.placeOrder).not.toHaveBeenCalled();
    expect(source.getBestPrice).not.toHaveBeenCalled();
  });

  it('places a Sell order on Bybit', async () => {
    const router = routerWith(bestPriceSource(new Error('unused')));

    const result = await router.placeOrder({ side: 'Sell', quantity: 0.002, exchange: 'Bybit' });

    expect(result).toEqual({ orderId: '54321' });
    expect(bybit.placeOrder).toHaveBeenCalledWith('BTCUSDT', 'Sell', 0.002);
    expect(binance.placeOrder).not.toHaveBeenCalled();
  });

  it('returns the adapter result unmodified', async () => {
    const payload = { orderId: 'abc', fills: [{ price: '60000.00' }], nested: { status: 'FILLED' } };
    binance = createFakeExchange(ExchangeId.BINANCE, { order: payload });
    const router = routerWith(bestPriceSource(new Error('unused')));

    await expect(router.placeOrder({ side: 'Buy', quantity: 1, exchange: 'Binance' })).resolves.toBe(payload);
  });

  it('matches exchange names case-insensitively', async () => {
    const router = routerWith(bestPriceSource(new Error('unused')));

    await router.placeOrder({ side: 'Buy', quantity: 0.5, exchange: ' bybit ' });

    expect(bybit.placeOrder).toHaveBeenCalledWith('BTCUSDT', 'Buy', 0.5);
  });

  it('passes a custom symbol through', async () => {
    const router = routerWith(bestPriceSource(new Error('unused')));

    await router.placeOrder({ side: 'Sell', quantity: 2, symbol: 'ETHUSDT', exchange: 'Binance' });

    expect(binance.placeOrder).toHaveBeenCalledWith('ETHUSDT', 'Sell', 2);
  });

  it('normalizes side casing before dispatch', async () => {
    const router = routerWith(bestPriceSource(new Error('unused')));

    await router.placeOrder({ side: 'BUY', quantity: 1, exchange: 'Binance' });
    await router.placeOrder({ side: 'sell', quantity: 1, exchange: 'Binance' });

    expect(binance.placeOrder).toHaveBeenNthCalledWith(1, 'BTCUSDT', 'Buy', 1);
    expect(binance.placeOrder).toHaveBeenNthCalledWith(2, 'BTCUSDT', 'Sell', 1);
  });

  it('rejects an invalid side without any aggregator or adapter call', async () => {
    const source = bestPriceSource({ price: 60000, exchange: ExchangeId.BINANCE });
    const router = routerWith(source);

    await expect(router.placeOrder({ side: 'Hold', quantity: 0.001 })).rejects.toBeInstanceOf(InvalidSideError);
    await expect(router.placeOrder({ side: 'Hold', quantity: 0.001, exchange: 'Binance' })).rejects.toThrow(
      "Invalid side: Hold. Side must be either 'Buy' or 'Sell'."
    );

    expect(source.getBestPrice).not.toHaveBeenCalled();
    expect(binance.getPrice).not.toHaveBeenCalled();
    expect(binance.placeOrder).not.toHaveBeenCalled();
    expect(bybit.getPrice).not.toHaveBeenCalled();
    expect(bybit.placeOrder).not.toHaveBeenCalled();
  });

  it('rejects a non-positive quantity without any call', async () => {
    const source = bestPriceSource({ price: 60000, exchange: ExchangeId.BINANCE });
    const router = routerWith(source);

    for (const quantity of [0, -0.001, Number.NaN, Number.POSITIVE_INFINITY]) {
      await expect(router.placeOrder({ side: 'Buy', quantity })).rejects.toBeInstanceOf(InvalidQuantityError);
    }

    expect(source.getBestPrice).not.toHaveBeenCalled();
    expect(binance.placeOrder).not.toHaveBeenCalled();
    expect(bybit.placeOrder).not.toHaveBeenCalled();
  });

  it('rejects an unknown exchange without any adapter call', async () => {
    const source = bestPriceSource({ price: 60000, exchange: ExchangeId.BINANCE });
    const router = routerWith(source);

    await expect(router.placeOrder({ side: 'Buy', quantity: 0.001, exchange: 'Unknown' })).rejects.toThrow(
      'Invalid exchange name: Unknown. Use one of: Binance, Bybit.'
    );

    expect(source.getBestPrice).not.toHaveBeenCalled();
    expect(binance.getPrice).not.toHaveBeenCalled();
    expect(binance.placeOrder).not.toHaveBeenCalled();
    expect(bybit.getPrice).not.toHaveBeenCalled();
    expect(bybit.placeOrder).not.toHaveBeenCalled();
  });

  it('treats a null exchange like an absent one', async () => {
    const source = bestPriceSource({ price: 60000, exchange: ExchangeId.BINANCE });
    const router = routerWith(source);

    await expect(router.placeOrder({ side: 'Buy', quantity: 0.001, exchange: null })).resolves.toEqual({
      orderId: '12345',
    });
    expect(source.getBestPrice).toHaveBeenCalledWith('BTCUSDT', 'lowest');
  });

  it('rejects an exchange name that is not a string', () => {
    const router = routerWith(bestPriceSource(new Error('unused')));

    expect(() => router.resolveExchange(42)).toThrow(InvalidExchangeError);
    expect(() => router.resolveExchange(42)).toThrow('Invalid exchange name: 42. Use one of: Binance, Bybit.');
  });

  it('routes a Buy without exchange to the lowest-price venue', async () => {
    const source = bestPriceSource({ price: 60000, exchange: ExchangeId.BINANCE });
    const router = routerWith(source);

    const result = await router.placeOrder({ side: 'Buy', quantity: 0.001 });

    expect(result).toEqual({ orderId: '12345' });
    expect(source.getBestPrice).toHaveBeenCalledTimes(1);
    expect(source.getBestPrice).toHaveBeenCalledWith('BTCUSDT', 'lowest');
    expect(binance.placeOrder).toHaveBeenCalledWith('BTCUSDT', 'Buy', 0.001);
    expect(bybit.placeOrder).not.toHaveBeenCalled();
  });

  it('routes a Sell without exchange to the highest-price venue', async () => {
    const source = bestPriceSource({ price: 61000, exchange: ExchangeId.BYBIT });
    const router = routerWith(source);

    const result = await router.placeOrder({ side: 'Sell', quantity: 0.002 });

    expect(result).toEqual({ orderId: '54321' });
    expect(source.getBestPrice).toHaveBeenCalledWith('BTCUSDT', 'highest');
    expect(bybit.placeOrder).toHaveBeenCalledTimes(1);
    expect(bybit.placeOrder).toHaveBeenCalledWith('BTCUSDT', 'Sell', 0.002);
    expect(binance.placeOrder).not.toHaveBeenCalled();
  });

  it('sends no order when no quote is available', async () => {
    const failure = new NoQuotesAvailableError('BTCUSDT');
    const router = routerWith(bestPriceSource(failure));

    await expect(router.placeOrder({ side: 'Buy', quantity: 0.001 })).rejects.toBe(failure);

    expect(binance.placeOrder).not.toHaveBeenCalled();
    expect(bybit.placeOrder).not.toHaveBeenCalled();
  });

  it('rejects an auto-resolved exchange that is not registered', async () => {
    const router = new OrderRouter(
      bestPriceSource({ price: 61000, exchange: ExchangeId.BYBIT }),
      [binance],
      { logger: quietLogger() }
    );

    await expect(router.placeOrder({ side: 'Sell', quantity: 1 })).rejects.toBeInstanceOf(InvalidExchangeError);
    expect(binance.placeOrder).not.toHaveBeenCalled();
  });

  it('propagates adapter errors unchanged', async () => {
    const failure = new SigningError('no credentials', ExchangeId.BYBIT);
    bybit = createFakeExchange(ExchangeId.BYBIT, { orderError: failure });
    const router = routerWith(bestPriceSource(new Error('unused')));

    await expect(router.placeOrder({ side: 'Buy', quantity: 1, exchange: 'Bybit' })).rejects.toBe(failure);
  });

  it('resolves the venue through a real aggregator', async () => {
    binance = createFakeExchange(ExchangeId.BINANCE, { raw: binanceTicker('60000.0'), order: { orderId: '12345' } });
    bybit = createFakeExchange(ExchangeId.BYBIT, { raw: bybitTickers('61000.0'), order: { orderId: '54321' } });
    const aggregator = new QuoteAggregator([binance, bybit], { logger: quietLogger() });
    const router = routerWith(aggregator);

    await expect(router.placeOrder({ side: 'Buy', quantity: 0.001 })).resolves.toEqual({ orderId: '12345' });
    await expect(router.placeOrder({ side: 'Sell', quantity: 0.001 })).resolves.toEqual({ orderId: '54321' });

    expect(binance.placeOrder).toHaveBeenCalledTimes(1);
    expect(bybit.placeOrder).toHaveBeenCalledTimes(1);
  });
});

describe('parseOrderSide', () => {
  it('normalizes known sides', () => {
    expect(parseOrderSide('Buy')).toBe('Buy');
    expect(parseOrderSide('buy')).toBe('Buy');
    expect(parseOrderSide('SELL')).toBe('Sell');
  });

  it('rejects anything else', () => {
    expect(() => parseOrderSide('Hold')).toThrow(InvalidSideError);
    expect(() => parseOrderSide('')).toThrow(InvalidSideError);
    expect(() => parseOrderSide(undefined)).toThrow(InvalidSideError);
  });
});

describe('validateQuantity', () => {
  it('accepts positive finite numbers', () => {
    expect(validateQuantity(0.001)).toBe(0.001);
  });

  it('rejects the rest', () => {
    expect(() => validateQuantity(0)).toThrow('Invalid quantity: 0. Quantity must be a positive number.');
    expect(() => validateQuantity('1')).toThrow(InvalidQuantityError);
  });
});

describe('priceModeFor', () => {
  it('buys low and sells high', () => {
    expect(priceModeFor('Buy')).toBe('lowest');
    expect(priceModeFor('Sell')).toBe('highest');
  });
});
