import { collectSettlements } from '../market/settlements';
import { SETTLEMENT_COLUMNS } from '../export/csv';
import { settlementInstantOf } from '../utils/time';
import { CommandOptions, UsageError, createContext, report } from './shared';

export interface SettlementCommandOptions extends CommandOptions {
  /** Settlement day, YYYY-MM-DD; the last 90 days when omitted */
  date?: string;
}

export async function runSettlement(options: SettlementCommandOptions): Promise<void> {
  if (options.date !== undefined && settlementInstantOf(options.date) === null) {
    throw new UsageError(`Invalid date "${options.date}", expected YYYY-MM-DD`);
  }

  const context = createContext(options);
  context.log.header(`${context.currency} settlements`);

  const result = await collectSettlements(context.client, {
    currency: context.currency,
    date: options.date,
    asOf: context.asOf,
    logger: context.log,
  });

  report(context, `options_settlement_${options.date ?? 'recent'}.csv`, result, SETTLEMENT_COLUMNS, [
    'instrument',
    'settlement_time',
    'index_price',
    'mark_price',
  ]);
}
