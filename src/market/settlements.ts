import { DeribitClient } from '../client/DeribitClient';
import { DeribitSettlement } from '../client/types';
import { settlementAdapter } from '../adapters';
import { MILLISECONDS_PER_DAY } from '../types';
import { Logger, logger as rootLogger } from '../utils/logger';
import { settlementInstantOf } from '../utils/time';
import { CollectionResult, SettlementRow } from './types';

/**
 * Settlement day that is not a valid YYYY-MM-DD date
 */
export class InvalidSettlementDateError extends Error {
  readonly date: string;

  constructor(date: string) {
    super(`Invalid settlement date "${date}", expected YYYY-MM-DD`);
    this.name = 'InvalidSettlementDateError';
    this.date = date;
  }
}

export interface SettlementOptions {
  currency: string;
  /** Settlement day, YYYY-MM-DD; recent settlements when omitted */
  date?: string;
  /** Look-back for recent settlements in days (default: 90) */
  daysBack?: number;
  /** Settlement events requested (default: 1000) */
  count?: number;
  /** Reference instant for the look-back (default: now) */
  asOf?: number;
  logger?: Logger;
}

/**
 * Keeps settlements inside `[from, to]` and sorts them newest first
 */
export function buildSettlementRows(settlements: DeribitSettlement[], from: number, to: number): SettlementRow[] {
  return settlements
    .filter((settlement) => settlement.timestamp >= from && settlement.timestamp <= to)
    .sort((a, b) => b.timestamp - a.timestamp)
    .map(settlementAdapter);
}

/**
 * Settlement history for a currency, either around one settlement day
 * (within a day of its 08:00 UTC settlement) or over the last `daysBack` days.
 *
 * @throws {InvalidSettlementDateError} If `date` is not a valid YYYY-MM-DD date
 */
export async function collectSettlements(
  client: DeribitClient,
  options: SettlementOptions
): Promise<CollectionResult<SettlementRow>> {
  const log = options.logger ?? rootLogger;
  const count = options.count ?? 1000;

  let from: number;
  let to: number;

  if (options.date !== undefined) {
    const instant = settlementInstantOf(options.date);
    if (instant === null) {
      throw new InvalidSettlementDateError(options.date);
    }
    from = instant - MILLISECONDS_PER_DAY;
    to = instant + MILLISECONDS_PER_DAY;
    log.info(`Fetching ${options.currency} settlements around ${options.date}`);
  } else {
    const daysBack = options.daysBack ?? 90;
    to = options.asOf ?? Date.now();
    from = to - daysBack * MILLISECONDS_PER_DAY;
    log.info(`Fetching ${options.currency} settlements from the last ${daysBack} days`);
  }

  const page = await client.getLastSettlementsByCurrency(options.currency, to, count);
  const rows = buildSettlementRows(page.settlements, from, to);
  log.debug(`${page.settlements.length} settlements returned, ${rows.length} in range`);

  return { rows, spot: null, skipped: [], failed: [] };
}
