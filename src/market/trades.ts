import { DeribitClient } from '../client/DeribitClient';
import { DeribitTrade } from '../client/types';
import { GreeksEngine, SkippedInstrument } from '../greeks';
import { TradeAggregate, tradeReconstructionAdapter } from '../adapters';
import { MalformedIdentifierError } from '../utils/instrument';
import { Logger, logger as rootLogger } from '../utils/logger';
import { formatUtcDateTime } from '../utils/time';
import { CollectionResult, TradeReconstructionRow } from './types';

export interface TradeReconstructionOptions {
  currency: string;
  /** Trade window ending at `asOf`, in minutes (default: 60) */
  minutesBack?: number;
  /** Keep the `limit` most traded instruments (default: 200) */
  limit?: number;
  /** Trades requested from the exchange (default: 1000) */
  count?: number;
  /** End of the window and valuation instant (default: now) */
  asOf?: number;
  logger?: Logger;
}

/**
 * Groups trades by instrument. Prices are averaged by traded amount; the
 * latest price is the price of the newest trade. Sorted by total volume,
 * largest first.
 */
export function aggregateTrades(trades: DeribitTrade[]): TradeAggregate[] {
  const byInstrument = new Map<string, DeribitTrade[]>();

  for (const trade of trades) {
    const group = byInstrument.get(trade.instrument_name);
    if (group) {
      group.push(trade);
    } else {
      byInstrument.set(trade.instrument_name, [trade]);
    }
  }

  const aggregates: TradeAggregate[] = [];

  for (const [instrumentName, group] of byInstrument) {
    const ordered = [...group].sort((a, b) => a.timestamp - b.timestamp);
    const latest = ordered[ordered.length - 1];

    let totalVolume = 0;
    let weightedSum = 0;
    let priceSum = 0;
    for (const trade of ordered) {
      totalVolume += trade.amount;
      weightedSum += trade.price * trade.amount;
      priceSum += trade.price;
    }

    aggregates.push({
      instrumentName,
      vwap: totalVolume > 0 ? weightedSum / totalVolume : priceSum / ordered.length,
      latestPrice: latest.price,
      numTrades: ordered.length,
      totalVolume,
      lastTradeTimestamp: latest.timestamp,
    });
  }

  return aggregates.sort((a, b) => b.totalVolume - a.totalVolume);
}

/**
 * Recovers IV and Greeks from each aggregate's VWAP, quoted in units of the
 * underlying and converted at `spot`.
 */
export function buildTradeRows(
  aggregates: TradeAggregate[],
  engine: GreeksEngine,
  spot: number,
  asOf: number
): { rows: TradeReconstructionRow[]; skipped: SkippedInstrument[] } {
  const rows: TradeReconstructionRow[] = [];
  const skipped: SkippedInstrument[] = [];

  for (const aggregate of aggregates) {
    try {
      const calculation = engine.fromCoinPrice(aggregate.instrumentName, spot, aggregate.vwap, asOf);
      rows.push(tradeReconstructionAdapter(aggregate, calculation, spot));
    } catch (error) {
      if (!(error instanceof MalformedIdentifierError)) throw error;
      skipped.push({ instrumentName: aggregate.instrumentName, reason: error.reason });
    }
  }

  return { rows, skipped };
}

/**
 * Index price when the window ended, from the latest trade that carries one,
 * else from the nearest settlement
 */
export async function indexPriceAt(
  client: DeribitClient,
  currency: string,
  trades: DeribitTrade[],
  asOf: number
): Promise<number | null> {
  let indexPrice: number | null = null;
  let latestTimestamp = -Infinity;
  for (const trade of trades) {
    if (trade.index_price != null && trade.timestamp > latestTimestamp) {
      indexPrice = trade.index_price;
      latestTimestamp = trade.timestamp;
    }
  }
  if (indexPrice !== null) {
    return indexPrice;
  }
  return client.getHistoricalIndexPrice(currency, asOf);
}

/**
 * Fetches recent option trades for a currency and reconstructs IV and
 * Greeks for the most traded instruments.
 *
 * Without `asOf` the spot is the current index price. With `asOf` it is the
 * index price recorded on the window's trades (see {@link indexPriceAt}).
 */
export async function reconstructFromTrades(
  client: DeribitClient,
  engine: GreeksEngine,
  options: TradeReconstructionOptions
): Promise<CollectionResult<TradeReconstructionRow>> {
  const log = options.logger ?? rootLogger;
  const minutesBack = options.minutesBack ?? 60;
  const asOf = options.asOf ?? Date.now();
  const start = asOf - minutesBack * 60 * 1000;

  const current = options.asOf === undefined ? await client.getIndexPrice(options.currency) : null;

  const trades = await client.getLastTradesByCurrency(options.currency, start, asOf, options.count ?? 1000);
  log.info(`Found ${trades.length} trades in the last ${minutesBack} minutes`);

  const aggregates = aggregateTrades(trades).slice(0, options.limit ?? 200);
  if (aggregates.length === 0) {
    return { rows: [], spot: current, skipped: [], failed: [] };
  }

  const spot = current ?? (await indexPriceAt(client, options.currency, trades, asOf));
  if (spot === null) {
    log.warn(`No ${options.currency} index price near ${formatUtcDateTime(asOf)}`);
    return { rows: [], spot: null, skipped: [], failed: aggregates.map((aggregate) => aggregate.instrumentName) };
  }
  log.info(`${options.currency} index price: $${spot.toLocaleString('en-US')}`);

  const { rows, skipped } = buildTradeRows(aggregates, engine, spot, asOf);

  return { rows, spot, skipped, failed: [] };
}
