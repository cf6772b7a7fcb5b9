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
import type { Quote, SymbolInfo } from '../../core/types.js';
import { createChildLogger } from '../../monitoring/logger.js';
import type { HyperliquidClient } from './client.js';
import type { HLFrontendOrder, HLOrderWire } from './types.js';

const log = createChildLogger('hl-broker');

// Perp prices allow at most 6 - szDecimals decimals and 5 significant figures
const MAX_PRICE_DECIMALS = 6;
const PRICE_SIG_FIGS = 5;

export type HyperliquidApi = Pick<
  HyperliquidClient,
  | 'connect'
  | 'disconnect'
  | 'getL2Book'
  | 'getAssetInfos'
  | 'placeOrder'
  | 'placeOrderGroup'
  | 'cancelOrder'
  | 'getPositions'
  | 'getFrontendOpenOrders'
>;

export interface HyperliquidBrokerOptions {
  /** Price cushion for IOC "market" orders, in percent */
  slippagePct: number;
}

/**
 * Maps the broker contract onto Hyperliquid perps. A position is identified by
 * its coin (one net position per coin); SL and TP live as reduce-only trigger
 * orders beside it.
 */
export class HyperliquidBroker implements Broker {
  readonly name = 'hyperliquid';
  private readonly szDecimals = new Map<string, number>();

  constructor(
    private readonly api: HyperliquidApi,
    private readonly options: HyperliquidBrokerOptions,
  ) {}

  async connect(): Promise<void> {
    await this.api.connect();
    await this.loadMeta();
  }

  async disconnect(): Promise<void> {
    await this.api.disconnect();
  }

  async submitPendingOrder(request: PendingOrderRequest): Promise<BrokerResult> {
    return this.guard('submitPendingOrder', async () => {
      const decimals = await this.sizeDecimals(request.symbol);
      if (decimals === null) return rejected(Retcode.InvalidRequest, `Unknown coin ${request.symbol}`);

      const size = roundSize(request.volume, decimals);
      if (size.isZero()) return rejected(Retcode.InvalidRequest, `Volume ${request.volume} below lot size`);

      const isBuy = request.side === 'buy';
      const entry: HLOrderWire = {
        coin: request.symbol,
        is_buy: isBuy,
        sz: size.toNumber(),
        limit_px: formatPrice(request.price, decimals),
        order_type: { limit: { tif: 'Gtc' } },
        reduce_only: false,
      };
      const protection = this.protectionOrders(request.symbol, isBuy, size, request.stopLoss, request.takeProfit, decimals);

      const [result] = await this.api.placeOrderGroup([entry, ...protection], 'normalTpsl');
      if (!result || result.error) return rejected(Retcode.Rejected, result?.error ?? 'No order status');
      if (result.orderId === null) return rejected(Retcode.Rejected, 'Order not accepted');

      const id = String(result.orderId);
      return result.filled
        ? accepted(`Filled at ${result.avgPrice ?? entry.limit_px}`, { orderId: id, dealId: id })
        : accepted('Order resting', { orderId: id });
    });
  }

  async submitMarketOrder(request: OrderRequest): Promise<BrokerResult> {
    return this.guard('submitMarketOrder', async () => {
      const decimals = await this.sizeDecimals(request.symbol);
      if (decimals === null) return rejected(Retcode.InvalidRequest, `Unknown coin ${request.symbol}`);

      const quote = await this.getQuote(request.symbol);
      if (!quote) return rejected(Retcode.InvalidRequest, `No book for ${request.symbol}`);

      const size = roundSize(request.volume, decimals);
      if (size.isZero()) return rejected(Retcode.InvalidRequest, `Volume ${request.volume} below lot size`);

      const isBuy = request.side === 'buy';
      const entry: HLOrderWire = {
        coin: request.symbol,
        is_buy: isBuy,
        sz: size.toNumber(),
        limit_px: this.slippagePrice(quote, isBuy, decimals),
        order_type: { limit: { tif: 'Ioc' } },
        reduce_only: false,
      };
      const protection = this.protectionOrders(request.symbol, isBuy, size, request.stopLoss, request.takeProfit, decimals);

      const [result] = await this.api.placeOrderGroup([entry, ...protection], 'normalTpsl');
      if (!result || result.error) return rejected(Retcode.Rejected, result?.error ?? 'No order status');
      if (!result.filled || result.orderId === null) return rejected(Retcode.Rejected, 'IOC order not filled');

      const id = String(result.orderId);
      return accepted(`Filled at ${result.avgPrice ?? entry.limit_px}`, { orderId: id, dealId: id });
    });
  }

  async modifyPosition(positionId: string, stopLoss: number | null, takeProfit: number | null): Promise<BrokerResult> {
    return this.guard('modifyPosition', async () => {
      const position = (await this.api.getPositions()).find((ap) => ap.position.coin === positionId);
      if (!position) return rejected(Retcode.NotFound, `No open position on ${positionId}`);

      const decimals = (await this.sizeDecimals(positionId)) ?? 0;
      const szi = new Decimal(position.position.szi);
      const isBuy = szi.isPositive();

      // Replace the existing protection rather than stacking new triggers on top
      const triggers = (await this.api.getFrontendOpenOrders()).filter(
        (o) => o.coin === positionId && o.isTrigger && o.reduceOnly,
      );
      for (const trigger of triggers) {
        const cancelled = await this.api.cancelOrder(positionId, trigger.oid);
        if (!cancelled) return rejected(Retcode.Rejected, `Could not cancel trigger ${trigger.oid}`);
      }

      const orders = this.protectionOrders(positionId, isBuy, szi.abs(), stopLoss, takeProfit, decimals);
      if (orders.length === 0) return accepted('Protection cleared');

      const results = await this.api.placeOrderGroup(orders, 'positionTpsl');
      const failure = results.find((r) => r.error);
      if (failure?.error) return rejected(Retcode.Rejected, failure.error);
      return accepted('Protection updated');
    });
  }

  async closePosition(positionId: string, volume: number): Promise<BrokerResult> {
    return this.guard('closePosition', async () => {
      const position = (await this.api.getPositions()).find((ap) => ap.position.coin === positionId);
      if (!position) return rejected(Retcode.NotFound, `No open position on ${positionId}`);

      const szi = new Decimal(position.position.szi);
      if (szi.abs().lessThan(volume)) {
        return rejected(Retcode.InvalidRequest, `Close volume ${volume} exceeds position ${szi.abs().toString()}`);
      }

      const quote = await this.getQuote(positionId);
      if (!quote) return rejected(Retcode.InvalidRequest, `No book for ${positionId}`);

      const decimals = (await this.sizeDecimals(positionId)) ?? 0;
      const isBuy = szi.isNegative();
      const result = await this.api.placeOrder({
        coin: positionId,
        isBuy,
        size: roundSize(volume, decimals).toString(),
        price: String(this.slippagePrice(quote, isBuy, decimals)),
        orderType: 'market',
        reduceOnly: true,
      });

      if (result.error) return rejected(Retcode.Rejected, result.error);
      if (!result.filled || result.orderId === null) return rejected(Retcode.Rejected, 'Close order not filled');
      return accepted(`Closed at ${result.avgPrice ?? 'market'}`, { dealId: String(result.orderId) });
    });
  }

  async cancelOrder(orderId: string): Promise<BrokerResult> {
    return this.guard('cancelOrder', async () => {
      const order = (await this.api.getFrontendOpenOrders()).find((o) => String(o.oid) === orderId);
      if (!order) return rejected(Retcode.NotFound, `Order ${orderId} not found`);

      const cancelled = await this.api.cancelOrder(order.coin, order.oid);
      return cancelled ? accepted('Order cancelled') : rejected(Retcode.Rejected, `Cancel of ${orderId} failed`);
    });
  }

  async listOpenOrders(): Promise<BrokerOrder[]> {
    const orders = await this.api.getFrontendOpenOrders();
    return orders
      .filter((o) => !o.reduceOnly && !o.isTrigger)
      .map((o): BrokerOrder => ({
        id: String(o.oid),
        symbol: o.coin,
        side: o.side === 'B' ? 'buy' : 'sell',
        volume: parseFloat(o.sz),
        price: parseFloat(o.limitPx),
        stopLoss: null,
        takeProfit: null,
      }));
  }

  async listOpenPositions(): Promise<BrokerPosition[]> {
    const [positions, orders] = await Promise.all([this.api.getPositions(), this.api.getFrontendOpenOrders()]);

    const result: BrokerPosition[] = [];
    for (const { position: p } of positions) {
      const szi = parseFloat(p.szi);
      const decimals = await this.sizeDecimals(p.coin);
      const triggers = orders.filter((o) => o.coin === p.coin && o.isTrigger && o.reduceOnly);
      result.push({
        id: p.coin,
        symbol: p.coin,
        side: szi > 0 ? 'buy' : 'sell',
        volume: Math.abs(szi),
        // Reported at trigger precision so an SL placed at entry compares equal to it
        entryPrice: decimals === null ? parseFloat(p.entryPx) : formatPrice(p.entryPx, decimals),
        currentPrice: null,
        stopLoss: triggerPrice(triggers, 'Stop'),
        takeProfit: triggerPrice(triggers, 'Take Profit'),
        profit: parseFloat(p.unrealizedPnl),
      });
    }
    return result;
  }

  async getQuote(symbol: string): Promise<Quote | null> {
    const book = await this.api.getL2Book(symbol);
    const [bids, asks] = book.levels;
    if (!bids?.[0] || !asks?.[0]) return null;
    return { bid: parseFloat(bids[0].px), ask: parseFloat(asks[0].px) };
  }

  async getSymbolInfo(symbol: string): Promise<SymbolInfo | null> {
    const decimals = await this.sizeDecimals(symbol);
    if (decimals === null) return null;
    return { symbol, digits: MAX_PRICE_DECIMALS - decimals, volumeDigits: decimals };
  }

  private protectionOrders(
    coin: string,
    entryIsBuy: boolean,
    size: Decimal,
    stopLoss: number | null,
    takeProfit: number | null,
    decimals: number,
  ): HLOrderWire[] {
    const orders: HLOrderWire[] = [];
    const legs: Array<['tp' | 'sl', number | null]> = [['tp', takeProfit], ['sl', stopLoss]];
    for (const [tpsl, price] of legs) {
      if (price === null || !(price > 0)) continue;
      const px = formatPrice(price, decimals);
      orders.push({
        coin,
        is_buy: !entryIsBuy,
        sz: size.toNumber(),
        limit_px: px,
        order_type: { trigger: { triggerPx: px, isMarket: true, tpsl } },
        reduce_only: true,
      });
    }
    return orders;
  }

  private slippagePrice(quote: Quote, isBuy: boolean, decimals: number): number {
    const factor = new Decimal(this.options.slippagePct).div(100);
    const px = isBuy
      ? new Decimal(quote.ask).mul(factor.plus(1))
      : new Decimal(quote.bid).mul(new Decimal(1).minus(factor));
    return formatPrice(px, decimals);
  }

  private async sizeDecimals(coin: string): Promise<number | null> {
    if (!this.szDecimals.has(coin)) {
      await this.loadMeta();
    }
    return this.szDecimals.get(coin) ?? null;
  }

  private async loadMeta(): Promise<void> {
    const assets = await this.api.getAssetInfos();
    for (const asset of assets) {
      this.szDecimals.set(asset.name, asset.szDecimals);
      this.szDecimals.set(`${asset.name}-PERP`, asset.szDecimals);
    }
    log.info({ assets: assets.length }, 'Loaded perp metadata');
  }

  private async guard(operation: string, call: () => Promise<BrokerResult>): Promise<BrokerResult> {
    try {
      return await call();
    } catch (err) {
      log.error({ err, operation }, 'Hyperliquid call failed');
      return rejected(Retcode.Error, err instanceof Error ? err.message : String(err));
    }
  }
}

export function formatPrice(value: Decimal.Value, szDecimals: number): number {
  const maxDecimals = Math.max(0, MAX_PRICE_DECIMALS - szDecimals);
  return new Decimal(value).toSignificantDigits(PRICE_SIG_FIGS).toDecimalPlaces(maxDecimals).toNumber();
}

function roundSize(volume: number, szDecimals: number): Decimal {
  return new Decimal(volume).toDecimalPlaces(szDecimals, Decimal.ROUND_DOWN);
}

function triggerPrice(orders: HLFrontendOrder[], kind: 'Stop' | 'Take Profit'): number | null {
  const match = orders.find((o) => o.orderType.startsWith(kind));
  return match ? parseFloat(match.triggerPx) : null;
}
