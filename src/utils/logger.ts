/**
 * Console logger plus table helpers for quote output
 */
import { LOG_CONFIG } from '../config/index.js';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  enableTimestamp?: boolean;
}

/**
 * Row printed by displayQuotes
 */
export interface QuoteRow {
  exchange: string;
  price: number | null;
}

/**
 * Resolve a level name such as "warn" to a LogLevel
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return fallback;
  }
}

export class Logger {
  private level: LogLevel;
  private prefix: string;
  private enableTimestamp: boolean;

  private static readonly LEVEL_PRIORITY: Record<LogLevel, number> = {
    [LogLevel.DEBUG]: 0,
    [LogLevel.INFO]: 1,
    [LogLevel.WARN]: 2,
    [LogLevel.ERROR]: 3,
  };

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(LOG_CONFIG.LEVEL);
    this.prefix = options.prefix ?? '[Gateway]';
    this.enableTimestamp = options.enableTimestamp ?? true;
  }

  private getTimestamp(): string {
    if (!this.enableTimestamp) return '';
    return `[${new Date().toISOString()}]`;
  }

  private shouldLog(level: LogLevel): boolean {
    return Logger.LEVEL_PRIORITY[level] >= Logger.LEVEL_PRIORITY[this.level];
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.shouldLog(level)) return;

    const formattedMessage = `${this.getTimestamp()}${this.prefix}[${level}] ${message}`;

    switch (level) {
      case LogLevel.ERROR:
        console.error(formattedMessage, ...args);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage, ...args);
        break;
      case LogLevel.DEBUG:
        console.debug(formattedMessage, ...args);
        break;
      default:
        console.log(formattedMessage, ...args);
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Logger sharing this one's level and timestamp setting under another prefix
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix,
      enableTimestamp: this.enableTimestamp,
    });
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }

  /**
   * Print one line per exchange quote; the best exchange is starred
   */
  displayQuotes(symbol: string, quotes: readonly QuoteRow[], bestExchange?: string): void {
    console.log('\n' + '='.repeat(44));
    console.log(`📊 Quotes: ${symbol}`);
    console.log('='.repeat(44));
    console.log(`${'Exchange'.padEnd(12)} | ${'Price'.padStart(20)} | Best`);
    console.log('─'.repeat(44));

    for (const quote of quotes) {
      const price = quote.price === null ? 'n/a' : quote.price.toFixed(2);
      const marker = quote.exchange === bestExchange ? '*' : '';
      console.log(`${quote.exchange.padEnd(12)} | ${price.padStart(20)} | ${marker}`);
    }

    console.log('─'.repeat(44) + '\n');
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger();

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
