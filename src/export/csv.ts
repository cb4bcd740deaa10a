import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { stringify } from 'csv-stringify/sync';
import { QuotedOptionRow, SettlementRow, TradeReconstructionRow } from '../market/types';

export const QUOTED_COLUMNS = [
  'instrument',
  'underlying',
  'expiry',
  'strike',
  'type',
  'mark_price',
  'last_price',
  'bid',
  'ask',
  'bid_size',
  'ask_size',
  'volume',
  'volume_usd',
  'open_interest',
  'iv',
  'spot_price',
  'underlying_price',
  'delta',
  'gamma',
  'vega',
  'theta',
] as const satisfies ReadonlyArray<keyof QuotedOptionRow>;

export const TRADE_COLUMNS = [
  'instrument',
  'vwap',
  'latest_price',
  'num_trades',
  'total_volume',
  'last_trade',
  'spot_price',
  'calculated_iv',
  'delta',
  'gamma',
  'vega',
  'theta',
] as const satisfies ReadonlyArray<keyof TradeReconstructionRow>;

export const SETTLEMENT_COLUMNS = [
  'instrument',
  'settlement_date',
  'settlement_time',
  'settlement_type',
  'index_price',
  'mark_price',
  'session_profit_loss',
] as const satisfies ReadonlyArray<keyof SettlementRow>;

type Cell = string | number | null | undefined;

/**
 * Serializes rows to CSV with a header line. Missing values (null, undefined
 * or NaN) become empty cells.
 */
export function toCsv<Row extends { [K in Column]: Cell }, Column extends string>(
  rows: Row[],
  columns: ReadonlyArray<Column>
): string {
  const records = rows.map((row) =>
    Object.fromEntries(columns.map((column) => [column, formatCell(row[column])]))
  );
  return stringify(records, { header: true, columns: [...columns] });
}

/**
 * Writes rows as CSV, creating the parent directory when needed
 */
export function writeCsv<Row extends { [K in Column]: Cell }, Column extends string>(
  path: string,
  rows: Row[],
  columns: ReadonlyArray<Column>
): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, toCsv(rows, columns), 'utf8');
}

function formatCell(value: Cell): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return Number.isNaN(value) ? '' : String(value);
  return value;
}
