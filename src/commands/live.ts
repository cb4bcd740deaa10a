import { reconstructFromTrades } from '../market/trades';
import { TRADE_COLUMNS } from '../export/csv';
import { CommandOptions, UsageError, createContext, report } from './shared';

export interface LiveOptions extends CommandOptions {
  /** Trade window in minutes (default: 60) */
  minutes?: number;
}

/**
 * IV and Greeks reconstructed from the volume-weighted price of recent trades
 */
export async function runLive(options: LiveOptions): Promise<void> {
  const minutes = options.minutes ?? 60;
  if (!(Number.isInteger(minutes) && minutes > 0)) {
    throw new UsageError(`Invalid minutes "${options.minutes}", expected a positive integer`);
  }

  const context = createContext(options);
  context.log.header(`${context.currency} options: Greeks from trades (last ${minutes} min)`);

  const result = await reconstructFromTrades(context.client, context.engine, {
    currency: context.currency,
    minutesBack: minutes,
    asOf: context.asOf,
    logger: context.log,
  });

  const unresolved = result.rows.filter((row) => Number.isNaN(row.calculated_iv)).length;
  if (unresolved > 0) {
    context.log.warn(`Implied volatility unresolved for ${unresolved} instrument(s)`);
  }

  report(context, `options_live_${minutes}min.csv`, result, TRADE_COLUMNS, [
    'instrument',
    'vwap',
    'num_trades',
    'calculated_iv',
    'delta',
    'gamma',
  ]);
}
