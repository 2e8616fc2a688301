/**
 * Binance Exchange Implementation
 *
 * Implements IExchange on top of the Spot REST client. Requests are signed
 * with the HMAC secret, or with a PEM private key when one is configured.
 */
import { readFileSync } from 'fs';
import { createPrivateKey } from 'crypto';
import { Spot, Side, OrderType } from '@binance/connector-typescript';
import {
  ExchangeId,
  ExchangeError,
  IExchange,
  OrderResult,
  OrderSide,
  ProtocolError,
  RawPriceResponse,
  SigningError,
  TransportError,
  describeError,
  isRecord,
} from '../interface.js';
import type { BinanceConfig } from '../../config/index.js';
import { createLogger, type Logger } from '../../utils/logger.js';

/**
 * The slice of the Spot client this adapter calls
 */
export interface BinanceSpotClient {
  symbolPriceTicker(options?: { symbol?: string }): Promise<unknown>;
  newOrder(
    symbol: string,
    side: Side,
    type: OrderType,
    options?: { quantity?: number }
  ): Promise<unknown>;
}

export class BinanceExchange implements IExchange {
  readonly id = ExchangeId.BINANCE;
  private readonly client: BinanceSpotClient;
  private readonly logger: Logger;

  constructor(
    private readonly config: BinanceConfig,
    client?: BinanceSpotClient,
    logger?: Logger
  ) {
    this.client = client ?? createSpotClient(config);
    this.logger = logger ?? createLogger({ prefix: '[Binance]' });
  }

  async getPrice(symbol: string): Promise<RawPriceResponse> {
    const formattedSymbol = symbol.toUpperCase();
    this.logger.debug(`Fetching ticker price for ${formattedSymbol}`);

    try {
      return await this.client.symbolPriceTicker({ symbol: formattedSymbol });
    } catch (error) {
      const failure = this.toExchangeError(error, 'price request');
      this.logger.error(`Failed to fetch price for ${formattedSymbol}: ${failure.message}`);
      throw failure;
    }
  }

  async placeOrder(symbol: string, side: OrderSide, quantity: number): Promise<OrderResult> {
    if (!this.config.apiKey || (!this.config.secretKey && !this.config.privateKeyPath)) {
      throw new SigningError('Binance API key and a secret or private key are required to sign orders', this.id);
    }

    const formattedSymbol = symbol.toUpperCase();
    const wireSide = side === 'Buy' ? Side.BUY : Side.SELL;
    this.logger.debug(`Placing MARKET ${wireSide} ${quantity} ${formattedSymbol}`);

    let response: unknown;
    try {
      response = await this.client.newOrder(formattedSymbol, wireSide, OrderType.MARKET, { quantity });
    } catch (error) {
      const failure = this.toExchangeError(error, 'order request');
      this.logger.error(`Failed to place order on ${formattedSymbol}: ${failure.message}`);
      throw failure;
    }

    if (!isRecord(response)) {
      throw new ProtocolError('Binance returned an unexpected order payload', 200, String(response), this.id);
    }
    return response;
  }

  // ==================== Private Methods ====================

  /**
   * The Spot client throws the exchange's `msg` string when the API answered
   * with an error status, and an Error when no answer arrived. The HTTP status
   * itself does not survive the client.
   */
  private toExchangeError(error: unknown, action: string): ExchangeError {
    if (error instanceof ExchangeError) return error;

    if (error instanceof Error) {
      return new TransportError(`Binance ${action} failed: ${error.message}`, this.id, { cause: error });
    }

    const body = typeof error === 'string' ? error : String(error);
    return new ProtocolError(`Binance ${action} rejected: ${body}`, undefined, body, this.id, { cause: error });
  }
}

/**
 * Read a PEM private key and check that the passphrase opens it
 * @throws SigningError
 */
export function loadPrivateKey(path: string, passphrase?: string): string {
  let pem: string;
  try {
    pem = readFileSync(path, 'utf8');
  } catch (error) {
    throw new SigningError(`Private key file not found at ${path}`, ExchangeId.BINANCE, { cause: error });
  }

  try {
    createPrivateKey({ key: pem, format: 'pem', passphrase });
  } catch (error) {
    throw new SigningError(`Error loading private key: ${describeError(error)}`, ExchangeId.BINANCE, { cause: error });
  }
  return pem;
}

function createSpotClient(config: BinanceConfig): Spot {
  if (config.privateKeyPath) {
    return new Spot(config.apiKey, '', {
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      privateKey: Buffer.from(loadPrivateKey(config.privateKeyPath, config.privateKeyPassphrase), 'utf8'),
      privateKeyPassphrase: config.privateKeyPassphrase,
      privateKeyAlgo: config.privateKeyAlgo,
    });
  }

  return new Spot(config.apiKey, config.secretKey, {
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
  });
}

export function createBinanceExchange(config: BinanceConfig): IExchange {
  return new BinanceExchange(config);
}

export default BinanceExchange;
