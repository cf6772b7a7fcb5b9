import { vi } from 'vitest';
import { accepted, type Broker } from '../broker.js';
import type { Signal } from '../types.js';

/** Broker whose every call is a vi.fn; pass overrides for the calls a test cares about */
export function fakeBroker(overrides: Partial<Broker> = {}): Broker {
  return {
    name: 'fake',
    connect: vi.fn(async () => undefined),
    disconnect: vi.fn(async () => undefined),
    submitPendingOrder: vi.fn(async () => accepted('Pending order placed', { orderId: '100' })),
    submitMarketOrder: vi.fn(async () => accepted('Market order filled', { orderId: '200', dealId: '200' })),
    modifyPosition: vi.fn(async () => accepted('Position modified')),
    closePosition: vi.fn(async () => accepted('Position closed', { dealId: '300' })),
    cancelOrder: vi.fn(async () => accepted('Order cancelled')),
    listOpenOrders: vi.fn(async () => []),
    listOpenPositions: vi.fn(async () => []),
    getQuote: vi.fn(async () => null),
    getSymbolInfo: vi.fn(async () => null),
    ...overrides,
  };
}

export function buySignal(overrides: Partial<Signal> = {}): Signal {
  return {
    symbol: 'XAUUSD',
    direction: 'buy',
    rangeStart: 3990,
    rangeEnd: 3985,
    stopLoss: 3980,
    takeProfit: 4010,
    volume: 0.09,
    rawText: 'XAUUSD BUY 3990-3985 SL 3980 TP 4010',
    timestamp: '2026-01-05T10:00:00.000Z',
    ...overrides,
  };
}
