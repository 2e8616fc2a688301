/**
 * Per-exchange extraction of a single price from a raw ticker payload.
 *
 * Binance: `price` at the top level.
 * Bybit:   `result.list[0].lastPrice`, where a null leaf means no price.
 */
import { ExchangeId, RawPriceResponse, isRecord } from '../exchanges/interface.js';
import type { Quote } from './types.js';

export type PriceExtractor = (raw: RawPriceResponse) => number | null;

/**
 * Accept finite, non-negative numbers or numeric strings; anything else is absent
 */
export function parsePrice(value: unknown): number | null {
  let parsed: number;

  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    parsed = Number(value.trim());
  } else {
    return null;
  }

  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}

export function extractBinancePrice(raw: RawPriceResponse): number | null {
  if (!isRecord(raw)) return null;
  return parsePrice(raw.price);
}

export function extractBybitPrice(raw: RawPriceResponse): number | null {
  if (!isRecord(raw)) return null;

  const result = raw.result;
  if (!isRecord(result)) return null;

  const list = result.list;
  if (!Array.isArray(list) || list.length === 0) return null;

  const first: unknown = list[0];
  if (!isRecord(first)) return null;

  return parsePrice(first.lastPrice);
}

export const PRICE_EXTRACTORS: Record<ExchangeId, PriceExtractor> = {
  [ExchangeId.BINANCE]: extractBinancePrice,
  [ExchangeId.BYBIT]: extractBybitPrice,
};

export function normalizeQuote(
  exchange: ExchangeId,
  raw: RawPriceResponse,
  extractors: Record<ExchangeId, PriceExtractor> = PRICE_EXTRACTORS
): Quote {
  return { exchange, price: extractors[exchange](raw) };
}
