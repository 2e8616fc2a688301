/**
 * Exchange Factory
 *
 * Builds adapters from the gateway configuration. The returned list follows
 * ExchangeId declaration order, which is also the tie-break priority.
 */
import { IExchange, ExchangeError, ExchangeId } from './interface.js';
import { BinanceExchange } from './binance/exchange.js';
import { BybitExchange } from './bybit/exchange.js';
import type { GatewayConfig } from '../config/index.js';

export class ExchangeFactory {
  /**
   * Create an adapter for one exchange
   * @param type Exchange identifier, matched case-insensitively
   */
  static create(type: ExchangeId | string, config: GatewayConfig): IExchange {
    switch (type.toLowerCase()) {
      case 'binance':
        return new BinanceExchange(config.binance);

      case 'bybit':
        return new BybitExchange(config.bybit);

      default:
        throw new ExchangeError(
          `Unknown exchange type: ${type}. Supported types: ${ExchangeFactory.supported().join(', ')}`,
          'UNKNOWN_EXCHANGE'
        );
    }
  }

  /**
   * Create adapters for several exchanges, every supported one by default
   */
  static createAll(config: GatewayConfig, types: readonly (ExchangeId | string)[] = ExchangeFactory.supported()): IExchange[] {
    return types.map((type) => ExchangeFactory.create(type, config));
  }

  static supported(): ExchangeId[] {
    return Object.values(ExchangeId);
  }
}

export function createExchanges(config: GatewayConfig): IExchange[] {
  return ExchangeFactory.createAll(config);
}

export default ExchangeFactory;
