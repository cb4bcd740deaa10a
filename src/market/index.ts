export * from './types';
export { collectQuotedGreeks } from './quotes';
export type { QuotedGreeksOptions } from './quotes';
export { aggregateTrades, buildTradeRows, indexPriceAt, reconstructFromTrades } from './trades';
export type { TradeReconstructionOptions } from './trades';
export { InvalidSettlementDateError, buildSettlementRows, collectSettlements } from './settlements';
export type { SettlementOptions } from './settlements';
export { probeApi } from './probe';
export type { ProbeCheck, ProbeReport } from './probe';
