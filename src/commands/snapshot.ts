import { collectQuotedGreeks } from '../market/quotes';
import { QUOTED_COLUMNS } from '../export/csv';
import { CommandOptions, UsageError, createContext, report } from './shared';

export interface SnapshotOptions extends CommandOptions {
  /** Instruments to price (default: all active) */
  limit?: number;
}

/**
 * Full market snapshot: bid/ask, sizes, volume and open interest next to
 * the Greeks, optionally for the first `limit` instruments only
 */
export async function runSnapshot(options: SnapshotOptions): Promise<void> {
  if (options.limit !== undefined && !(Number.isInteger(options.limit) && options.limit > 0)) {
    throw new UsageError(`Invalid limit "${options.limit}", expected a positive integer`);
  }

  const context = createContext(options);
  context.log.header(`${context.currency} options: full snapshot`);

  const result = await collectQuotedGreeks(context.client, context.engine, {
    currency: context.currency,
    limit: options.limit,
    asOf: context.asOf,
    delayMs: context.config.requestDelayMs,
    logger: context.log,
  });

  report(context, 'options_snapshot_full.csv', result, QUOTED_COLUMNS, [
    'instrument',
    'bid',
    'ask',
    'open_interest',
    'iv',
    'delta',
    'theta',
  ]);
}
