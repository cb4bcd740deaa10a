#!/usr/bin/env node
/**
 * deribit-greeks CLI
 *
 * Pulls option market data from the public exchange API and writes CSV
 * tables of Delta, Gamma, Vega and Theta.
 *
 * Usage: deribit-greeks <command> [options]
 */

import { Command, InvalidArgumentError } from 'commander';
import { CurrentOptions, DEFAULT_CURRENT_LIMIT, runCurrent } from './commands/current';
import { runSnapshot } from './commands/snapshot';
import { runLive } from './commands/live';
import { runSettlement } from './commands/settlement';
import { runTest } from './commands/connectivity';
import { CommandOptions, UsageError } from './commands/shared';
import { ConfigError } from './config';
import { DeribitApiError } from './client/DeribitClient';
import { InvalidSettlementDateError } from './market/settlements';
import { logger } from './utils/logger';

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --currency <code>', 'Underlying currency (default: DERIBIT_CURRENCY or BTC)')
    .option('-o, --out <dir>', 'Output directory (default: OUTPUT_DIR or .)')
    .option('--as-of <time>', 'Valuation time, YYYY-MM-DD[ HH:MM] UTC (default: now)')
    .option('-v, --verbose', 'Verbose output', false);
}

/**
 * Runs a command and turns known failures into a message and exit code 1
 */
async function execute(run: () => Promise<unknown>): Promise<void> {
  try {
    const outcome = await run();
    if (outcome === false) process.exitCode = 1;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration');
      for (const issue of error.issues) logger.error(`  ${issue}`);
    } else if (
      error instanceof UsageError ||
      error instanceof DeribitApiError ||
      error instanceof InvalidSettlementDateError
    ) {
      logger.error(error.message);
    } else {
      throw error;
    }
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('deribit-greeks')
  .description('Option Greeks (Delta, Gamma, Vega, Theta) from public exchange data')
  .version('1.0.0');

// ============================================================================
// CURRENT: quoted mark IV for the first active options
// ============================================================================
withCommonOptions(program.command('current'))
  .description(`Greeks for the first ${DEFAULT_CURRENT_LIMIT} active options from quoted mark IV`)
  .option('-l, --limit <n>', 'Number of options to price', positiveInteger, DEFAULT_CURRENT_LIMIT)
  .action(async (opts: CurrentOptions) => {
    await execute(() => runCurrent(opts));
  });

// ============================================================================
// SNAPSHOT: quoted IV plus the order book top and volume
// ============================================================================
withCommonOptions(program.command('snapshot'))
  .description('Full market snapshot with Greeks')
  .argument('[limit]', 'Only the first N instruments', positiveInteger)
  .action(async (limit: number | undefined, opts: CommandOptions) => {
    await execute(() => runSnapshot({ ...opts, limit }));
  });

// ============================================================================
// LIVE: IV and Greeks reconstructed from recent trades
// ============================================================================
withCommonOptions(program.command('live'))
  .description('Greeks reconstructed from recent trade prices')
  .argument('[minutes]', 'Trade window in minutes', positiveInteger, 60)
  .action(async (minutes: number, opts: CommandOptions) => {
    await execute(() => runLive({ ...opts, minutes }));
  });

// ============================================================================
// SETTLEMENT: settlement history
// ============================================================================
withCommonOptions(program.command('settlement'))
  .description('Settlement prices for a date (YYYY-MM-DD) or the last 90 days')
  .argument('[date]', 'Settlement date, YYYY-MM-DD')
  .action(async (date: string | undefined, opts: CommandOptions) => {
    await execute(() => runSettlement({ ...opts, date }));
  });

// ============================================================================
// TEST: API connectivity
// ============================================================================
withCommonOptions(program.command('test'))
  .description('Check connectivity to the public API')
  .action(async (opts: CommandOptions) => {
    await execute(() => runTest(opts));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exitCode = 1;
});
