/**
 * Output rows. Field names and their order are the column layout of the
 * exported tables; renaming or reordering them breaks downstream readers.
 */

import { SkippedInstrument } from '../greeks';

/**
 * One option priced from its quoted mark IV ("current" and "snapshot")
 */
export interface QuotedOptionRow {
  instrument: string;
  underlying: string;
  /** Expiry date, YYYY-MM-DD (settles 08:00 UTC) */
  expiry: string;
  strike: number;
  /** 'C' or 'P' */
  type: string;
  mark_price: number;
  last_price: number | null;
  bid: number | null;
  ask: number | null;
  bid_size: number | null;
  ask_size: number | null;
  volume: number | null;
  volume_usd: number | null;
  open_interest: number | null;
  /** Mark IV in percent */
  iv: number | null;
  spot_price: number;
  underlying_price: number | null;
  delta: number;
  gamma: number;
  vega: number;
  theta: number;
}

/**
 * One option reconstructed from recent trades ("live")
 */
export interface TradeReconstructionRow {
  instrument: string;
  /** Volume-weighted average trade price, in units of the underlying */
  vwap: number;
  latest_price: number;
  num_trades: number;
  total_volume: number;
  /** YYYY-MM-DD HH:MM:SS UTC */
  last_trade: string;
  spot_price: number;
  /** Implied volatility recovered from the VWAP, in percent; NaN when unresolved */
  calculated_iv: number;
  delta: number;
  gamma: number;
  vega: number;
  theta: number;
}

/**
 * One settlement event ("settlement")
 */
export interface SettlementRow {
  instrument: string;
  settlement_date: string;
  settlement_time: string;
  settlement_type: string;
  index_price: number | null;
  mark_price: number | null;
  session_profit_loss: number | null;
}

/**
 * Rows plus what was left out on the way
 */
export interface CollectionResult<Row> {
  rows: Row[];
  /** Spot (index) price used, when the collection needed one */
  spot: number | null;
  /** Names that did not parse as option names */
  skipped: SkippedInstrument[];
  /** Instruments whose market data request failed */
  failed: string[];
}
