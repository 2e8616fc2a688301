/**
 * Bybit Exchange Implementation
 *
 * REST v5 over fetch. Order requests are signed with HMAC-SHA256 over
 * timestamp + apiKey + recvWindow + body.
 */
import * as crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import {
  ExchangeId,
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
import type { BybitConfig } from '../../config/index.js';
import { createLogger, type Logger } from '../../utils/logger.js';

type HttpMethod = 'GET' | 'POST';

interface RequestOptions {
  query?: string;
  body?: string;
  headers?: Record<string, string>;
}

export class BybitExchange implements IExchange {
  readonly id = ExchangeId.BYBIT;
  private readonly logger: Logger;

  constructor(private readonly config: BybitConfig, logger?: Logger) {
    this.logger = logger ?? createLogger({ prefix: '[Bybit]' });
  }

  async getPrice(symbol: string): Promise<RawPriceResponse> {
    const query = new URLSearchParams({
      category: this.config.category,
      symbol: symbol.toUpperCase(),
    }).toString();

    return this.request('GET', '/v5/market/tickers', { query });
  }

  async placeOrder(symbol: string, side: OrderSide, quantity: number): Promise<OrderResult> {
    const body = JSON.stringify(this.buildOrderBody(symbol, side, quantity));
    const headers = this.signHeaders(body);

    this.logger.debug(`Placing Market ${side} ${quantity} ${symbol.toUpperCase()} (${this.config.category})`);
    const payload = await this.request('POST', '/v5/order/create', { body, headers });

    if (!isRecord(payload)) {
      throw new ProtocolError('Bybit returned an unexpected order payload', 200, JSON.stringify(payload), this.id);
    }
    return payload;
  }

  /**
   * HMAC-SHA256 hex digest of timestamp + apiKey + recvWindow + payload
   */
  createSignature(timestamp: string, payload: string): string {
    const message = timestamp + this.config.apiKey + this.config.recvWindow.toString() + payload;
    return crypto
      .createHmac('sha256', this.config.apiSecret)
      .update(message)
      .digest('hex');
  }

  // ==================== Private Methods ====================

  private buildOrderBody(symbol: string, side: OrderSide, quantity: number): Record<string, unknown> {
    const body: Record<string, unknown> = {
      category: this.config.category,
      symbol: symbol.toUpperCase(),
      side,
      orderType: 'Market',
      qty: quantity.toString(),
      orderLinkId: uuidv4().replace(/-/g, ''),
    };

    // qty is in the base coin on every venue; spot market buys default to the quote coin
    if (this.config.category === 'spot') {
      body.marketUnit = 'baseCoin';
    }

    // One-way mode position on derivatives
    if (this.config.category === 'linear') {
      body.timeInForce = 'GTC';
      body.positionIdx = 0;
    }

    return body;
  }

  private signHeaders(payload: string): Record<string, string> {
    if (!this.config.apiKey || !this.config.apiSecret) {
      throw new SigningError('Bybit API key and secret are required to sign orders', this.id);
    }

    const timestamp = Date.now().toString();
    let signature: string;
    try {
      signature = this.createSignature(timestamp, payload);
    } catch (error) {
      throw new SigningError(`Failed to sign Bybit request: ${describeError(error)}`, this.id, { cause: error });
    }

    return {
      'X-BAPI-API-KEY': this.config.apiKey,
      'X-BAPI-SIGN': signature,
      'X-BAPI-SIGN-TYPE': '2',
      'X-BAPI-TIMESTAMP': timestamp,
      'X-BAPI-RECV-WINDOW': this.config.recvWindow.toString(),
    };
  }

  private async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const url = `${this.config.baseUrl}${path}${options.query ? `?${options.query}` : ''}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let status = 0;
    let text = '';
    try {
      const response = await fetch(url, {
        method,
        headers: { 'Content-Type': 'application/json', ...options.headers },
        body: options.body,
        signal: controller.signal,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const message = controller.signal.aborted
        ? `Bybit ${method} ${path} timed out after ${this.config.timeoutMs}ms`
        : `Bybit ${method} ${path} failed: ${describeError(error)}`;
      this.logger.error(message);
      throw new TransportError(message, this.id, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (status < 200 || status >= 300) {
      this.logger.error(`HTTP ${status} from ${method} ${path}: ${text}`);
      throw new ProtocolError(`Bybit API error: HTTP ${status}`, status, text, this.id);
    }

    const payload = parseJson(text);
    if (payload === undefined) {
      throw new ProtocolError(`Bybit returned a non-JSON body for ${method} ${path}`, status, text, this.id);
    }

    if (isRecord(payload) && typeof payload.retCode === 'number' && payload.retCode !== 0) {
      const retMsg = typeof payload.retMsg === 'string' ? payload.retMsg : 'unknown error';
      this.logger.error(`retCode ${payload.retCode} from ${method} ${path}: ${retMsg}`);
      throw new ProtocolError(`Bybit API error: ${retMsg} (code: ${payload.retCode})`, status, text, this.id);
    }

    return payload;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function createBybitExchange(config: BybitConfig): IExchange {
  return new BybitExchange(config);
}

export default BybitExchange;
