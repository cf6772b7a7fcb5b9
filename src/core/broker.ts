import type { Direction, Quote, SymbolInfo } from './types.js';

/** Return codes shared by every broker adapter */
export const Retcode = {
  Done: 0,
  Rejected: 1,
  InvalidRequest: 2,
  NotFound: 3,
  NoConnection: 4,
  Error: 5,
} as const;

export type RetcodeValue = (typeof Retcode)[keyof typeof Retcode];

export interface BrokerResult {
  accepted: boolean;
  retcode: RetcodeValue;
  reason: string;
  orderId?: string;
  dealId?: string;
}

export interface OrderRequest {
  symbol: string;
  side: Direction;
  volume: number;
  stopLoss: number;
  takeProfit: number;
  comment: string;
}

export interface PendingOrderRequest extends OrderRequest {
  price: number;
}

export interface BrokerOrder {
  id: string;
  symbol: string;
  side: Direction;
  volume: number;
  price: number;
  stopLoss: number | null;
  takeProfit: number | null;
  comment?: string;
}

export interface BrokerPosition {
  id: string;
  symbol: string;
  side: Direction;
  volume: number;
  entryPrice: number;
  currentPrice: number | null;
  stopLoss: number | null;
  takeProfit: number | null;
  profit: number | null;
}

/**
 * Narrow view of a trading venue. The core never touches an SDK directly;
 * adapters translate these calls and map venue errors to rejected results.
 */
export interface Broker {
  readonly name: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  submitPendingOrder(request: PendingOrderRequest): Promise<BrokerResult>;
  submitMarketOrder(request: OrderRequest): Promise<BrokerResult>;
  modifyPosition(positionId: string, stopLoss: number | null, takeProfit: number | null): Promise<BrokerResult>;
  /** Closes `volume` of the position with an opposite-side market deal */
  closePosition(positionId: string, volume: number): Promise<BrokerResult>;
  cancelOrder(orderId: string): Promise<BrokerResult>;

  listOpenOrders(): Promise<BrokerOrder[]>;
  listOpenPositions(): Promise<BrokerPosition[]>;
  getQuote(symbol: string): Promise<Quote | null>;
  getSymbolInfo(symbol: string): Promise<SymbolInfo | null>;
}

export function accepted(reason: string, ids: { orderId?: string; dealId?: string } = {}): BrokerResult {
  return { accepted: true, retcode: Retcode.Done, reason, ...ids };
}

export function rejected(retcode: Exclude<RetcodeValue, 0>, reason: string): BrokerResult {
  return { accepted: false, retcode, reason };
}

export function describeResult(result: BrokerResult): string {
  return result.accepted ? result.reason : `${result.retcode} - ${result.reason}`;
}
