import { collectQuotedGreeks } from '../market/quotes';
import { QUOTED_COLUMNS } from '../export/csv';
import { CommandOptions, UsageError, createContext, report } from './shared';

/** Options `current` prices unless told otherwise */
export const DEFAULT_CURRENT_LIMIT = 20;

export interface CurrentOptions extends CommandOptions {
  /** Active options to price (default: 20) */
  limit?: number;
}

/**
 * Quick look at the first active options, priced from their current
 * quoted mark IV
 */
export async function runCurrent(options: CurrentOptions): Promise<void> {
  const limit = options.limit ?? DEFAULT_CURRENT_LIMIT;
  if (!(Number.isInteger(limit) && limit > 0)) {
    throw new UsageError(`Invalid limit "${options.limit}", expected a positive integer`);
  }

  const context = createContext(options);
  context.log.header(`${context.currency} options: quoted IV Greeks (first ${limit})`);

  const result = await collectQuotedGreeks(context.client, context.engine, {
    currency: context.currency,
    limit,
    asOf: context.asOf,
    delayMs: context.config.requestDelayMs,
    logger: context.log,
  });

  report(context, 'options_current.csv', result, QUOTED_COLUMNS, [
    'instrument',
    'mark_price',
    'iv',
    'delta',
    'gamma',
    'vega',
    'theta',
  ]);
}
