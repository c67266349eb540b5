#!/usr/bin/env node

/**
 * Command line entry point
 *
 * Loads configuration, wires the application and runs trading cycles until
 * SIGINT or SIGTERM.
 */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { errorMessage, isTradeLoopError } from '@tradeloop/contracts';
import { attachGlobalHandlers, createLogger, startTimer, type Logger } from '@tradeloop/logger';
import { DEFAULT_CONFIG_PATH, getConfigSummary, loadConfig } from './config/index.js';
import { createApp } from './app.js';

const VERSION = '0.1.0';

interface CliOptions {
  config: string;
  dryRun: boolean;
  once: boolean;
}

const program = new Command();

program
  .name('tradeloop')
  .description('Periodic signal-fusion trading bot')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to the JSON configuration file', DEFAULT_CONFIG_PATH)
  .option('-d, --dry-run', 'Trade against an in-memory paper exchange', false)
  .option('--once', 'Run a single cycle and exit', false)
  .action(async (options: CliOptions) => {
    process.exitCode = await run(options);
  });

/**
 * Main startup function
 *
 * @returns Process exit code
 */
async function run(options: CliOptions): Promise<number> {
  let logger: Logger | undefined;

  try {
    const env = options.dryRun ? { ...process.env, DRY_RUN: 'true' } : process.env;
    const config = loadConfig(options.config, env);

    logger = createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      logDir: config.logging.dir,
    });
    attachGlobalHandlers(logger);

    const startupTimer = startTimer();
    logger.info('Starting trading bot', { version: VERSION, ...getConfigSummary(config) });

    const app = createApp({ config, logger });
    const quote = config.trading.quote_currency;

    const cash = await app.exchange.getBalance(quote);
    if (cash === null) {
      logger.error('Exchange account unavailable, check the API keys', { exchange: app.exchange.id });
      return 1;
    }
    logger.info('Exchange connected', { exchange: app.exchange.id, mode: app.mode, cash_balance: cash });

    await app.notifier.notifyStartup({ version: VERSION, markets: config.trading.markets, mode: app.mode });

    const portfolio = await app.risk.checkPortfolioRisk();
    logger.info('Startup complete', {
      duration_ms: startupTimer.stop(),
      total_balance: portfolio.totalBalance,
      risk_level: portfolio.riskLevel,
    });

    if (options.once) {
      const summary = await app.cycle.run();
      return summary.error ? 1 : 0;
    }

    const controller = new AbortController();
    const shutdown = (signal: NodeJS.Signals) => {
      logger?.info('Shutdown requested, finishing the current cycle', { signal });
      controller.abort();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    const runs = await app.scheduler.start(controller.signal);
    logger.info('Trading bot stopped', { cycles: runs });
    return 0;
  } catch (error) {
    const fields = isTradeLoopError(error) ? error.toJSON() : { error: errorMessage(error) };
    if (logger) {
      logger.error('Trading bot failed', fields);
    } else {
      console.error('Trading bot failed:', errorMessage(error));
    }
    return 1;
  }
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Trading bot failed:', errorMessage(error));
  process.exitCode = 1;
});
