export type HLTif = 'Gtc' | 'Ioc' | 'Alo';

export interface HLOrderParams {
  coin: string;
  isBuy: boolean;
  size: string;
  price: string;
  orderType: 'limit' | 'market';
  reduceOnly: boolean;
  tif?: HLTif;
}

/** Wire shape the SDK's exchange.placeOrder accepts for a single order */
export interface HLOrderWire {
  coin: string;
  is_buy: boolean;
  sz: number;
  limit_px: number;
  order_type:
    | { limit: { tif: HLTif } }
    | { trigger: { triggerPx: number; isMarket: boolean; tpsl: 'tp' | 'sl' } };
  reduce_only: boolean;
}

export type HLGrouping = 'na' | 'normalTpsl' | 'positionTpsl';

export interface HLBulkOrderRequest {
  orders: HLOrderWire[];
  grouping: HLGrouping;
}

export interface HLOrderStatusEntry {
  resting?: { oid: number };
  filled?: { totalSz: string; avgPx: string; oid: number };
  error?: string;
}

export interface HLOrderResponse {
  status: string;
  response?: {
    type: string;
    data?: {
      statuses: Array<HLOrderStatusEntry | string>;
    };
  };
}

export interface HLOrderResult {
  orderId: number | null;
  filled: boolean;
  avgPrice: string | null;
  error: string | null;
}

export interface HLPosition {
  coin: string;
  szi: string; // signed size (negative = short)
  entryPx: string;
  positionValue: string;
  unrealizedPnl: string;
  leverage: {
    type: string;
    value: number;
  };
}

export interface HLClearinghouseState {
  marginSummary: {
    accountValue: string;
    totalMarginUsed: string;
    totalNtlPos: string;
  };
  assetPositions: Array<{
    position: HLPosition;
  }>;
}

/** Open order as returned by the frontendOpenOrders info request */
export interface HLFrontendOrder {
  coin: string;
  side: 'B' | 'A';
  limitPx: string;
  sz: string;
  oid: number;
  timestamp: number;
  origSz: string;
  reduceOnly: boolean;
  isTrigger: boolean;
  triggerPx: string;
  orderType: string;
  isPositionTpsl: boolean;
}

export interface HLBookLevel {
  px: string;
  sz: string;
  n: number;
}

export interface HLL2Book {
  coin: string;
  time: number;
  levels: [HLBookLevel[], HLBookLevel[]];
}

export interface HLAssetCtx {
  funding: string;
  openInterest: string;
  prevDayPx: string;
  dayNtlVlm: string;
  premium: string;
  oraclePx: string;
  markPx: string;
}

export interface HLPerpMeta {
  universe: Array<{
    name: string;
    szDecimals: number;
    maxLeverage: number;
  }>;
}

export interface HLAssetInfo {
  name: string;
  szDecimals: number;
  maxLeverage: number;
  markPrice: number;
}
