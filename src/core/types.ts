import type { EntryStrategyName } from '../config/index.js';

export type { EntryStrategyName };

export type Direction = 'buy' | 'sell';

// === Signals ===

export interface Signal {
  readonly symbol: string;
  readonly direction: Direction;
  /** Higher bound of the entry zone, whatever order the message used */
  readonly rangeStart: number;
  /** Lower bound of the entry zone */
  readonly rangeEnd: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
  readonly volume: number;
  readonly rawText: string;
  readonly timestamp: string;
}

export type ParseOutcome =
  | { ok: true; signal: Signal }
  | { ok: false; reason: string };

// === Market data ===

export interface Quote {
  bid: number;
  ask: number;
}

export interface SymbolInfo {
  symbol: string;
  /** Price decimals */
  digits: number;
  /** Volume decimals, when the venue enforces them */
  volumeDigits?: number;
}

export interface MarketContext {
  quote: Quote | null;
  digits: number | null;
}

// === Entry plans ===

export type ZoneLabel = 'start' | 'mid' | 'end' | 'single';

export interface EntryLeg {
  price: number;
  volume: number;
  /** Distance in pips from this leg's own entry; null means use the signal TP */
  takeProfitPips: number | null;
  legLabel: string;
  zoneLabel: ZoneLabel;
}

export interface EntryPlan {
  strategy: EntryStrategyName;
  representativePrice: number;
  orderKind: 'limit';
  /** Empty for single-entry strategies */
  legs: EntryLeg[];
  totalVolume: number;
  digits: number | null;
  pipSize: number;
  /** Price the strategy compared against (ask for buy, bid for sell), if any */
  referencePrice: number | null;
}

// === Execution ===

export type OrderType = 'limit' | 'market';

export interface LegResult {
  legLabel: string;
  accepted: boolean;
  orderType: OrderType;
  price: number;
  volume: number;
  takeProfit: number;
  orderId?: string;
  dealId?: string;
  retcode?: number;
  error?: string;
}

export type ExecutionStatus = 'filled' | 'partial' | 'failed';

export interface ExecutionResult {
  overallSuccess: boolean;
  status: ExecutionStatus;
  legs: LegResult[];
  /** Volume of accepted legs */
  aggregateVolume: number;
  /** Distinct entry prices of accepted legs, in plan order */
  aggregateEntryPrices: number[];
  warning?: string;
  error?: string;
}

// === Position management ===

export type CommandKind = 'break_even' | 'partial' | 'full_close' | 'tp_hit' | 'extend_tp';

export interface DetectedCommands {
  breakEven: boolean;
  partial: { level: string | null; pips: number | null } | null;
  fullClose: boolean;
  tpHit: boolean;
  extendTp: { price: number } | null;
}

export interface CommandOutcome {
  command: CommandKind;
  touched: number;
  skipped: number;
  failed: number;
  details: string[];
}
