import dotenv from 'dotenv';
import path from 'path';
import { ExchangeId } from '../exchanges/interface.js';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

type Env = Record<string, string | undefined>;

/**
 * Bybit product category used for tickers and orders
 */
export type BybitCategory = 'spot' | 'linear';

/**
 * Key type of a Binance private key file
 */
export type BinancePrivateKeyAlgo = 'RSA' | 'ED25519';

/**
 * What the quote aggregator does when a single exchange fails
 */
export type QuoteFailurePolicy = 'fail-fast' | 'degrade';

/**
 * Trading defaults
 */
export const TRADING_CONFIG = {
  /** Default trading symbol */
  DEFAULT_SYMBOL: process.env.DEFAULT_SYMBOL || 'BTCUSDT',
  /** Default order quantity used by the CLI */
  DEFAULT_QUANTITY: 0.001,
} as const;

/**
 * Binance REST endpoints
 */
export const BINANCE_URLS = {
  MAINNET: 'https://api.binance.com',
  TESTNET: 'https://testnet.binance.vision',
} as const;

/**
 * Bybit REST endpoints
 */
export const BYBIT_URLS = {
  MAINNET: 'https://api.bybit.com',
  TESTNET: 'https://api-testnet.bybit.com',
} as const;

/** Request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30000;

/** Bybit recvWindow in milliseconds */
export const DEFAULT_RECV_WINDOW = 5000;

/**
 * Logging configuration
 */
export const LOG_CONFIG = {
  /** Minimum log level name (DEBUG, INFO, WARN, ERROR) */
  LEVEL: process.env.LOG_LEVEL || 'INFO',
} as const;

export interface BinanceConfig {
  apiKey: string;
  /** HMAC secret; not needed when a private key file signs the requests */
  secretKey: string;
  testnet: boolean;
  baseUrl: string;
  timeoutMs: number;
  /** PEM private key used instead of the HMAC secret */
  privateKeyPath?: string;
  privateKeyPassphrase?: string;
  privateKeyAlgo: BinancePrivateKeyAlgo;
}

export interface BybitConfig {
  apiKey: string;
  apiSecret: string;
  testnet: boolean;
  baseUrl: string;
  timeoutMs: number;
  recvWindow: number;
  category: BybitCategory;
}

/**
 * Everything the gateway needs, handed explicitly to each adapter
 */
export interface GatewayConfig {
  binance: BinanceConfig;
  bybit: BybitConfig;
  quoteFailurePolicy: QuoteFailurePolicy;
}

/**
 * Parse a boolean env value; unknown values fall back to the default
 */
export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;

  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return fallback;
  }
}

/**
 * Parse a positive integer env value; malformed values fall back to the default
 */
export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;

  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function parseCategory(value: string | undefined): BybitCategory {
  return value?.trim().toLowerCase() === 'linear' ? 'linear' : 'spot';
}

function parsePrivateKeyAlgo(value: string | undefined): BinancePrivateKeyAlgo {
  return value?.trim().toUpperCase() === 'ED25519' ? 'ED25519' : 'RSA';
}

function parseFailurePolicy(value: string | undefined): QuoteFailurePolicy {
  return value?.trim().toLowerCase() === 'degrade' ? 'degrade' : 'fail-fast';
}

/**
 * Build the gateway configuration from environment variables.
 * Exchanges default to their testnets unless explicitly disabled.
 */
export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const timeoutMs = parsePositiveInt(env.REQUEST_TIMEOUT, DEFAULT_TIMEOUT_MS);
  const binanceTestnet = parseBoolean(env.BINANCE_TESTNET, true);
  const bybitTestnet = parseBoolean(env.BYBIT_TESTNET, true);

  return {
    binance: {
      apiKey: env.BINANCE_API_KEY || '',
      secretKey: env.BINANCE_SECRET_KEY || '',
      testnet: binanceTestnet,
      baseUrl: binanceTestnet ? BINANCE_URLS.TESTNET : BINANCE_URLS.MAINNET,
      timeoutMs,
      privateKeyPath: env.BINANCE_PRIVATE_KEY_PATH || undefined,
      privateKeyPassphrase: env.BINANCE_PRIVATE_KEY_PASSPHRASE || undefined,
      privateKeyAlgo: parsePrivateKeyAlgo(env.BINANCE_PRIVATE_KEY_ALGO),
    },
    bybit: {
      apiKey: env.BYBIT_API_KEY || '',
      apiSecret: env.BYBIT_API_SECRET || '',
      testnet: bybitTestnet,
      baseUrl: bybitTestnet ? BYBIT_URLS.TESTNET : BYBIT_URLS.MAINNET,
      timeoutMs,
      recvWindow: parsePositiveInt(env.BYBIT_RECV_WINDOW, DEFAULT_RECV_WINDOW),
      category: parseCategory(env.BYBIT_CATEGORY),
    },
    quoteFailurePolicy: parseFailurePolicy(env.QUOTE_FAILURE_POLICY),
  };
}

/**
 * Validates that every credential needed to place orders on the given exchanges is present.
 * Names are matched case-insensitively; unknown names are left for the router to reject.
 * @throws Error listing each missing credential
 */
export function validateConfig(
  config: GatewayConfig,
  exchanges: readonly string[] = Object.values(ExchangeId)
): void {
  const wanted = new Set(exchanges.map((name) => name.trim().toLowerCase()));
  const errors: string[] = [];

  if (wanted.has(ExchangeId.BINANCE.toLowerCase())) {
    if (!config.binance.apiKey) {
      errors.push('BINANCE_API_KEY is required. Please set it in your .env file.');
    }

    if (!config.binance.secretKey && !config.binance.privateKeyPath) {
      errors.push('BINANCE_SECRET_KEY or BINANCE_PRIVATE_KEY_PATH is required. Please set it in your .env file.');
    }
  }

  if (wanted.has(ExchangeId.BYBIT.toLowerCase())) {
    if (!config.bybit.apiKey) {
      errors.push('BYBIT_API_KEY is required. Please set it in your .env file.');
    }

    if (!config.bybit.apiSecret) {
      errors.push('BYBIT_API_SECRET is required. Please set it in your .env file.');
    }
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}
