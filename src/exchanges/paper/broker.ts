import { Decimal } from 'decimal.js';
import {
  Retcode,
  accepted,
  rejected,
  type Broker,
  type BrokerOrder,
  type BrokerPosition,
  type BrokerResult,
  type OrderRequest,
  type PendingOrderRequest,
} from '../../core/broker.js';
import type { Direction, Quote, SymbolInfo } from '../../core/types.js';
import { createChildLogger } from '../../monitoring/logger.js';

const log = createChildLogger('paper-broker');

interface StoredPosition {
  id: string;
  symbol: string;
  side: Direction;
  volume: Decimal;
  entryPrice: number;
  stopLoss: number | null;
  takeProfit: number | null;
}

/**
 * In-memory venue for dry runs and tests. Quotes and precision are seeded by
 * the caller; a resting limit fills once a seeded quote reaches its price.
 */
export class PaperBroker implements Broker {
  readonly name = 'paper';

  private connected = false;
  private nextId = 1;
  private readonly quotes = new Map<string, Quote>();
  private readonly symbols = new Map<string, SymbolInfo>();
  private readonly orders = new Map<string, BrokerOrder>();
  private readonly positions = new Map<string, StoredPosition>();

  async connect(): Promise<void> {
    this.connected = true;
    log.info('Paper broker connected');
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    log.info('Paper broker disconnected');
  }

  /** Seeds a quote and fills any resting order it crosses */
  setQuote(symbol: string, quote: Quote): void {
    this.quotes.set(symbol, quote);
    for (const order of [...this.orders.values()]) {
      if (order.symbol !== symbol) continue;
      const crossed = order.side === 'buy' ? quote.ask <= order.price : quote.bid >= order.price;
      if (crossed) {
        this.orders.delete(order.id);
        this.openPosition(order.symbol, order.side, order.volume, order.price, order.stopLoss, order.takeProfit);
        log.info({ orderId: order.id, price: order.price }, 'Resting order filled');
      }
    }
  }

  clearQuote(symbol: string): void {
    this.quotes.delete(symbol);
  }

  setSymbolInfo(info: SymbolInfo): void {
    this.symbols.set(info.symbol, info);
  }

  async submitPendingOrder(request: PendingOrderRequest): Promise<BrokerResult> {
    const invalid = this.validate(request);
    if (invalid) return invalid;
    if (!(request.price > 0)) return rejected(Retcode.InvalidRequest, 'Invalid price');

    const id = this.allocateId();
    this.orders.set(id, {
      id,
      symbol: request.symbol,
      side: request.side,
      volume: request.volume,
      price: request.price,
      stopLoss: request.stopLoss,
      takeProfit: request.takeProfit,
      comment: request.comment,
    });
    log.debug({ orderId: id, price: request.price, volume: request.volume }, 'Pending order placed');
    return accepted('Pending order placed', { orderId: id });
  }

  async submitMarketOrder(request: OrderRequest): Promise<BrokerResult> {
    const invalid = this.validate(request);
    if (invalid) return invalid;

    const quote = this.quotes.get(request.symbol);
    if (!quote) return rejected(Retcode.InvalidRequest, `No quote for ${request.symbol}`);

    const price = request.side === 'buy' ? quote.ask : quote.bid;
    const id = this.openPosition(request.symbol, request.side, request.volume, price, request.stopLoss, request.takeProfit);
    return accepted('Market order filled', { orderId: id, dealId: id });
  }

  async modifyPosition(positionId: string, stopLoss: number | null, takeProfit: number | null): Promise<BrokerResult> {
    if (!this.connected) return rejected(Retcode.NoConnection, 'Not connected');
    const pos = this.positions.get(positionId);
    if (!pos) return rejected(Retcode.NotFound, `Position ${positionId} not found`);

    pos.stopLoss = stopLoss;
    pos.takeProfit = takeProfit;
    return accepted('Position modified');
  }

  async closePosition(positionId: string, volume: number): Promise<BrokerResult> {
    if (!this.connected) return rejected(Retcode.NoConnection, 'Not connected');
    const pos = this.positions.get(positionId);
    if (!pos) return rejected(Retcode.NotFound, `Position ${positionId} not found`);
    if (!(volume > 0) || pos.volume.lessThan(volume)) {
      return rejected(Retcode.InvalidRequest, `Invalid close volume ${volume} for ${pos.volume.toString()}`);
    }

    pos.volume = pos.volume.minus(volume);
    if (pos.volume.isZero()) {
      this.positions.delete(positionId);
    }
    return accepted('Position closed', { dealId: this.allocateId() });
  }

  async cancelOrder(orderId: string): Promise<BrokerResult> {
    if (!this.connected) return rejected(Retcode.NoConnection, 'Not connected');
    if (!this.orders.delete(orderId)) return rejected(Retcode.NotFound, `Order ${orderId} not found`);
    return accepted('Order cancelled');
  }

  async listOpenOrders(): Promise<BrokerOrder[]> {
    return [...this.orders.values()].map((o) => ({ ...o }));
  }

  async listOpenPositions(): Promise<BrokerPosition[]> {
    return [...this.positions.values()].map((p) => {
      const quote = this.quotes.get(p.symbol);
      // Positions are marked at the price they would close at
      const currentPrice = quote ? (p.side === 'buy' ? quote.bid : quote.ask) : null;
      const sign = p.side === 'buy' ? 1 : -1;
      const profit = currentPrice === null
        ? null
        : new Decimal(currentPrice).minus(p.entryPrice).mul(p.volume).mul(sign).toNumber();
      return {
        id: p.id,
        symbol: p.symbol,
        side: p.side,
        volume: p.volume.toNumber(),
        entryPrice: p.entryPrice,
        currentPrice,
        stopLoss: p.stopLoss,
        takeProfit: p.takeProfit,
        profit,
      };
    });
  }

  async getQuote(symbol: string): Promise<Quote | null> {
    const quote = this.quotes.get(symbol);
    return quote ? { ...quote } : null;
  }

  async getSymbolInfo(symbol: string): Promise<SymbolInfo | null> {
    return this.symbols.get(symbol) ?? null;
  }

  private validate(request: OrderRequest): BrokerResult | null {
    if (!this.connected) return rejected(Retcode.NoConnection, 'Not connected');
    if (!(request.volume > 0)) return rejected(Retcode.InvalidRequest, 'Invalid volume');
    return null;
  }

  private openPosition(
    symbol: string,
    side: Direction,
    volume: number,
    price: number,
    stopLoss: number | null,
    takeProfit: number | null,
  ): string {
    const id = this.allocateId();
    this.positions.set(id, {
      id,
      symbol,
      side,
      volume: new Decimal(volume),
      entryPrice: price,
      stopLoss,
      takeProfit,
    });
    log.debug({ positionId: id, side, price, volume }, 'Position opened');
    return id;
  }

  private allocateId(): string {
    return String(this.nextId++);
  }
}
