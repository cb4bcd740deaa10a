import { GreeksCalculation, GreeksResult } from '../types';
import { DeribitSettlement, DeribitTicker } from '../client/types';
import { QuotedOptionRow, SettlementRow, TradeReconstructionRow } from '../market/types';
import { formatUtcDate, formatUtcDateTime } from '../utils/time';

/**
 * Per-instrument summary of a window of trades
 */
export interface TradeAggregate {
  instrumentName: string;
  /** Volume-weighted average price (plain mean when total volume is 0) */
  vwap: number;
  /** Price of the most recent trade */
  latestPrice: number;
  numTrades: number;
  totalVolume: number;
  lastTradeTimestamp: number;
}

/**
 * Rounds Greeks for tabular output: delta, vega and theta to 4 decimals,
 * gamma to 6. NaN stays NaN.
 */
export function roundGreeks(greeks: GreeksResult): GreeksResult {
  return {
    delta: round(greeks.delta, 4),
    gamma: round(greeks.gamma, 6),
    vega: round(greeks.vega, 4),
    theta: round(greeks.theta, 4),
  };
}

/**
 * Maps a ticker and its quoted-IV calculation to an output row
 */
export function quotedOptionAdapter(
  ticker: DeribitTicker,
  calculation: GreeksCalculation,
  spot: number
): QuotedOptionRow {
  const { instrument } = calculation;

  return {
    instrument: ticker.instrument_name,
    underlying: instrument.underlying,
    expiry: formatUtcDate(instrument.expirationTimestamp),
    strike: instrument.strike,
    type: instrument.optionType === 'call' ? 'C' : 'P',
    mark_price: ticker.mark_price,
    last_price: ticker.last_price ?? null,
    bid: ticker.best_bid_price ?? null,
    ask: ticker.best_ask_price ?? null,
    bid_size: ticker.best_bid_amount ?? null,
    ask_size: ticker.best_ask_amount ?? null,
    volume: ticker.stats?.volume ?? null,
    volume_usd: ticker.stats?.volume_usd ?? null,
    open_interest: ticker.open_interest ?? null,
    iv: ticker.mark_iv ?? null,
    spot_price: spot,
    underlying_price: ticker.underlying_price ?? null,
    ...roundGreeks(calculation.greeks),
  };
}

/**
 * Maps a trade aggregate and its price-inversion calculation to an output row
 */
export function tradeReconstructionAdapter(
  aggregate: TradeAggregate,
  calculation: GreeksCalculation,
  spot: number
): TradeReconstructionRow {
  return {
    instrument: aggregate.instrumentName,
    vwap: aggregate.vwap,
    latest_price: aggregate.latestPrice,
    num_trades: aggregate.numTrades,
    total_volume: aggregate.totalVolume,
    last_trade: formatUtcDateTime(aggregate.lastTradeTimestamp),
    spot_price: spot,
    calculated_iv: calculation.status === 'complete' ? round(calculation.volatility * 100, 4) : NaN,
    ...roundGreeks(calculation.greeks),
  };
}

export function settlementAdapter(settlement: DeribitSettlement): SettlementRow {
  return {
    instrument: settlement.instrument_name,
    settlement_date: formatUtcDate(settlement.timestamp),
    settlement_time: formatUtcDateTime(settlement.timestamp),
    settlement_type: settlement.type,
    index_price: settlement.index_price ?? null,
    mark_price: settlement.mark_price ?? null,
    session_profit_loss: settlement.session_profit_loss ?? null,
  };
}

/**
 * Helper: Round number to specified decimal places
 * @internal
 */
function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
