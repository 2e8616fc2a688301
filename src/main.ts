#!/usr/bin/env node
/**
 * Gateway CLI entry point
 *
 * Run commands:
 * - npm run dev -- quotes                          # Prices from every exchange
 * - npm run dev -- best --mode highest             # Best selling venue
 * - npm run dev -- order --side Buy -q 0.001       # Market buy on the cheapest venue
 */
import { createLogger } from './utils/logger.js';
import { loadGatewayConfig, validateConfig } from './config/index.js';
import { TradingGateway } from './services/trading-gateway.service.js';
import { ExchangeFactory } from './exchanges/factory.js';
import { CliError, HELP_TEXT, parseArgs, type CliArgs } from './cli.js';

const logger = createLogger({ prefix: '[Main]' });

async function runQuotes(gateway: TradingGateway, args: CliArgs): Promise<void> {
  const { quotes, lowest, highest } = await gateway.getQuoteSummary(args.symbol);

  logger.displayQuotes(args.symbol, quotes, lowest.exchange);
  logger.info(`Lowest price for ${args.symbol} is ${lowest.price} on ${lowest.exchange}`);
  logger.info(`Highest price for ${args.symbol} is ${highest.price} on ${highest.exchange}`);
}

async function runBest(gateway: TradingGateway, args: CliArgs): Promise<void> {
  const best = await gateway.getBestPrice(args.symbol, args.mode);
  logger.info(`Best ${args.mode} price for ${args.symbol} is ${best.price} on ${best.exchange}`);
}

async function runOrder(gateway: TradingGateway, args: CliArgs): Promise<void> {
  const order = await gateway.placeOrder({
    side: args.side ?? '',
    quantity: args.quantity,
    symbol: args.symbol,
    exchange: args.exchange,
  });
  logger.info('Order placed:', order);
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliError) {
      logger.error(error.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw error;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const config = loadGatewayConfig();
  if (args.command === 'order') {
    // Without --exchange the best venue can be either one
    validateConfig(config, args.exchange === undefined ? ExchangeFactory.supported() : [args.exchange]);
  }

  const gateway = TradingGateway.fromConfig(config, logger);

  switch (args.command) {
    case 'quotes':
      await runQuotes(gateway, args);
      break;
    case 'best':
      await runBest(gateway, args);
      break;
    case 'order':
      await runOrder(gateway, args);
      break;
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
