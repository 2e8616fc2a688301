/**
 * Command line parsing for the gateway CLI
 */
import { TRADING_CONFIG } from './config/index.js';
import { PRICE_MODES, type PriceMode } from './services/types.js';

export type Command = 'quotes' | 'best' | 'order';

export interface CliArgs {
  command: Command;
  symbol: string;
  mode: PriceMode;
  side?: string;
  quantity: number;
  exchange?: string;
  help: boolean;
}

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

function isCommand(value: string): value is Command {
  return value === 'quotes' || value === 'best' || value === 'order';
}

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('-')) {
    throw new CliError(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * Parse CLI arguments (without the node and script entries)
 */
export function parseArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = {
    command: 'quotes',
    symbol: TRADING_CONFIG.DEFAULT_SYMBOL,
    mode: 'lowest',
    quantity: TRADING_CONFIG.DEFAULT_QUANTITY,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;

      case '--symbol':
      case '-s':
        result.symbol = requireValue(args, ++i, arg).toUpperCase();
        break;

      case '--mode':
      case '-m': {
        const value = requireValue(args, ++i, arg).toLowerCase();
        const mode = PRICE_MODES.find((candidate) => candidate === value);
        if (mode === undefined) {
          throw new CliError(`Invalid mode: ${value}. Use ${PRICE_MODES.map((m) => `'${m}'`).join(' or ')}.`);
        }
        result.mode = mode;
        break;
      }

      case '--side':
        result.side = requireValue(args, ++i, arg);
        break;

      case '--quantity':
      case '-q': {
        const raw = requireValue(args, ++i, arg);
        const quantity = Number(raw);
        if (!Number.isFinite(quantity) || quantity <= 0) {
          throw new CliError(`Invalid quantity: ${raw}`);
        }
        result.quantity = quantity;
        break;
      }

      case '--exchange':
      case '-e':
        result.exchange = requireValue(args, ++i, arg);
        break;

      default:
        if (isCommand(arg) && i === 0) {
          result.command = arg;
        } else {
          throw new CliError(`Unknown argument: ${arg}`);
        }
    }
  }

  if (result.command === 'order' && result.side === undefined && !result.help) {
    throw new CliError('The order command requires --side Buy|Sell');
  }

  return result;
}

export const HELP_TEXT = `
Best-price gateway for Binance and Bybit

Usage: best-price-gateway <command> [options]

Commands:
  quotes                   Show every exchange's price and the best venues (default)
  best                     Show the best price for --mode
  order                    Place a market order on --exchange or the best venue

Options:
  -s, --symbol <symbol>    Trading pair (default: ${TRADING_CONFIG.DEFAULT_SYMBOL})
  -m, --mode <mode>        lowest | highest (default: lowest)
      --side <side>        Buy | Sell (order only)
  -q, --quantity <qty>     Order quantity (default: ${TRADING_CONFIG.DEFAULT_QUANTITY})
  -e, --exchange <name>    Binance | Bybit (order only; best venue when omitted)
  -h, --help               Show this help message

Examples:
  best-price-gateway quotes -s ETHUSDT
  best-price-gateway best --mode highest
  best-price-gateway order --side Buy -q 0.001
  best-price-gateway order --side Sell -q 0.002 -e Bybit
`;
