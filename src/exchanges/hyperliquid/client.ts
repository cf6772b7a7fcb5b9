import { Hyperliquid } from 'hyperliquid';
import { ethers } from 'ethers';
import { createChildLogger } from '../../monitoring/logger.js';
import type {
  HLAssetCtx,
  HLAssetInfo,
  HLBulkOrderRequest,
  HLClearinghouseState,
  HLFrontendOrder,
  HLGrouping,
  HLL2Book,
  HLOrderParams,
  HLOrderResponse,
  HLOrderResult,
  HLOrderStatusEntry,
  HLOrderWire,
  HLPerpMeta,
} from './types.js';

const log = createChildLogger('hyperliquid');

export interface HyperliquidClientOptions {
  privateKey: string;
  walletAddress?: string;
  testnet: boolean;
}

/** Methods of the SDK the published typings leave out or type too narrowly */
interface ExchangeExtras {
  placeOrder(request: HLBulkOrderRequest): Promise<unknown>;
}

interface InfoExtras {
  getFrontendOpenOrders(user: string): Promise<unknown>;
}

export class HyperliquidClient {
  private sdk: Hyperliquid;
  private connected = false;
  readonly walletAddress: string;
  readonly testnet: boolean;

  constructor(options: HyperliquidClientOptions) {
    // Derive wallet address from private key
    const wallet = new ethers.Wallet(options.privateKey);
    this.walletAddress = options.walletAddress ?? wallet.address;
    this.testnet = options.testnet;

    this.sdk = new Hyperliquid({
      enableWs: false,
      privateKey: options.privateKey,
      testnet: options.testnet,
    });

    log.info({ walletAddress: this.walletAddress, testnet: options.testnet }, 'Hyperliquid client created');
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    try {
      await this.sdk.connect();
      this.connected = true;
      log.info({ testnet: this.testnet }, 'Connected to Hyperliquid');
    } catch (err) {
      log.error({ err }, 'Failed to connect to Hyperliquid');
      throw err;
    }
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    log.info('Disconnected from Hyperliquid');
  }

  // === Market Data ===

  async getL2Book(coin: string): Promise<HLL2Book> {
    const book = await this.sdk.info.getL2Book(coin);
    return book as unknown as HLL2Book;
  }

  async getAssetInfos(): Promise<HLAssetInfo[]> {
    const metaAndCtxs = await this.sdk.info.perpetuals.getMetaAndAssetCtxs();
    const [meta, ctxs] = metaAndCtxs as unknown as [HLPerpMeta, HLAssetCtx[]];

    return meta.universe.map((u, i) => ({
      name: u.name,
      szDecimals: u.szDecimals,
      maxLeverage: u.maxLeverage,
      markPrice: parseFloat(ctxs[i]?.markPx ?? '0'),
    }));
  }

  // === Trading ===

  async placeOrder(params: HLOrderParams): Promise<HLOrderResult> {
    const orderType = params.orderType === 'market'
      ? { limit: { tif: 'Ioc' as const } }
      : { limit: { tif: params.tif ?? 'Gtc' } };

    try {
      const response = await this.sdk.exchange.placeOrder({
        coin: params.coin,
        is_buy: params.isBuy,
        sz: parseFloat(params.size),
        limit_px: parseFloat(params.price),
        order_type: orderType,
        reduce_only: params.reduceOnly,
      });

      const [result] = readStatuses(response);
      if (!result) {
        log.warn({ response }, 'Unexpected order response');
        return { orderId: null, filled: false, avgPrice: null, error: 'Unexpected response' };
      }
      if (result.error) {
        log.warn({ error: result.error, ...params }, 'Order rejected');
      } else {
        log.info({ orderId: result.orderId, filled: result.filled, ...params }, 'Order placed');
      }
      return result;
    } catch (err) {
      log.error({ err, ...params }, 'Order placement failed');
      return { orderId: null, filled: false, avgPrice: null, error: String(err) };
    }
  }

  /**
   * Places several orders in one action. With `normalTpsl` the first order is
   * the entry and the rest are its TP/SL children, armed once it fills.
   */
  async placeOrderGroup(orders: HLOrderWire[], grouping: HLGrouping): Promise<HLOrderResult[]> {
    try {
      const exchange = this.sdk.exchange as unknown as ExchangeExtras;
      const response = await exchange.placeOrder({ orders, grouping });
      const results = readStatuses(response);
      if (results.length === 0) {
        log.warn({ response }, 'Unexpected grouped order response');
        return orders.map(() => ({ orderId: null, filled: false, avgPrice: null, error: 'Unexpected response' }));
      }
      log.info({ grouping, count: orders.length, coin: orders[0]?.coin }, 'Order group placed');
      return results;
    } catch (err) {
      log.error({ err, grouping }, 'Grouped order placement failed');
      return orders.map(() => ({ orderId: null, filled: false, avgPrice: null, error: String(err) }));
    }
  }

  async cancelOrder(coin: string, orderId: number): Promise<boolean> {
    try {
      await this.sdk.exchange.cancelOrder({
        coin,
        o: orderId,
      });
      log.info({ coin, orderId }, 'Order cancelled');
      return true;
    } catch (err) {
      log.error({ err, coin, orderId }, 'Cancel order failed');
      return false;
    }
  }

  // === Account ===

  async getAccountState(): Promise<HLClearinghouseState> {
    const state = await this.sdk.info.perpetuals.getClearinghouseState(this.walletAddress);
    return state as unknown as HLClearinghouseState;
  }

  async getPositions(): Promise<HLClearinghouseState['assetPositions']> {
    const state = await this.getAccountState();
    return state.assetPositions.filter(
      (ap) => parseFloat(ap.position.szi) !== 0
    );
  }

  /** Open orders including trigger metadata, so TP/SL children can be told apart from entries */
  async getFrontendOpenOrders(): Promise<HLFrontendOrder[]> {
    const info = this.sdk.info as unknown as InfoExtras;
    const orders = await info.getFrontendOpenOrders(this.walletAddress);
    return Array.isArray(orders) ? (orders as HLFrontendOrder[]) : [];
  }
}

function readStatuses(response: unknown): HLOrderResult[] {
  const resp = response as HLOrderResponse;
  if (resp.status !== 'ok' || !resp.response?.data?.statuses) return [];

  return resp.response.data.statuses.map((status): HLOrderResult => {
    // Grouped TP/SL children that have not triggered come back as "waitingForFill"
    if (typeof status === 'string') {
      return { orderId: null, filled: false, avgPrice: null, error: null };
    }
    return readStatus(status);
  });
}

function readStatus(status: HLOrderStatusEntry): HLOrderResult {
  if (status.resting) {
    return { orderId: status.resting.oid, filled: false, avgPrice: null, error: null };
  }
  if (status.filled) {
    return { orderId: status.filled.oid, filled: true, avgPrice: status.filled.avgPx, error: null };
  }
  return { orderId: null, filled: false, avgPrice: null, error: status.error ?? 'Unknown order status' };
}
