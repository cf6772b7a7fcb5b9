import { beforeEach, describe, expect, it } from 'vitest';
import { Retcode } from '../../core/broker.js';
import { PaperBroker } from '../paper/broker.js';

const order = {
  symbol: 'XAUUSD',
  volume: 0.05,
  stopLoss: 3980,
  takeProfit: 4010,
  comment: 'test',
};

describe('PaperBroker', () => {
  let broker: PaperBroker;

  beforeEach(async () => {
    broker = new PaperBroker();
    await broker.connect();
  });

  it('rejects trading calls while disconnected', async () => {
    await broker.disconnect();

    const result = await broker.submitPendingOrder({ ...order, side: 'buy', price: 3990 });

    expect(result).toEqual({ accepted: false, retcode: Retcode.NoConnection, reason: 'Not connected' });
  });

  it('rests a limit until a quote crosses it', async () => {
    const placed = await broker.submitPendingOrder({ ...order, side: 'buy', price: 3990 });
    expect(placed).toEqual({ accepted: true, retcode: Retcode.Done, reason: 'Pending order placed', orderId: '1' });

    broker.setQuote('XAUUSD', { bid: 3994, ask: 3995 });
    expect(await broker.listOpenOrders()).toHaveLength(1);

    broker.setQuote('XAUUSD', { bid: 3989, ask: 3990 });
    expect(await broker.listOpenOrders()).toEqual([]);
    const [pos] = await broker.listOpenPositions();
    expect(pos).toEqual({
      id: '2',
      symbol: 'XAUUSD',
      side: 'buy',
      volume: 0.05,
      entryPrice: 3990,
      currentPrice: 3989,
      stopLoss: 3980,
      takeProfit: 4010,
      profit: -0.05,
    });
  });

  it('fills sell limits once the bid reaches them', async () => {
    await broker.submitPendingOrder({ ...order, side: 'sell', price: 4000 });

    broker.setQuote('XAUUSD', { bid: 4000, ask: 4000.5 });

    const [pos] = await broker.listOpenPositions();
    expect(pos.side).toBe('sell');
    expect(pos.currentPrice).toBe(4000.5);
    expect(pos.profit).toBe(-0.025);
  });

  it('needs a quote for market orders', async () => {
    const result = await broker.submitMarketOrder({ ...order, side: 'buy' });
    expect(result).toEqual({ accepted: false, retcode: Retcode.InvalidRequest, reason: 'No quote for XAUUSD' });
  });

  it('rejects invalid volumes and prices', async () => {
    expect((await broker.submitPendingOrder({ ...order, side: 'buy', price: 0 })).reason).toBe('Invalid price');
    expect((await broker.submitPendingOrder({ ...order, volume: 0, side: 'buy', price: 3990 })).reason).toBe('Invalid volume');
  });

  it('closes positions partially and then in full', async () => {
    broker.setQuote('XAUUSD', { bid: 3999, ask: 4000 });
    const opened = await broker.submitMarketOrder({ ...order, side: 'buy' });
    expect(opened.dealId).toBe('1');

    const partial = await broker.closePosition('1', 0.02);
    expect(partial).toMatchObject({ accepted: true, dealId: '2' });
    expect((await broker.listOpenPositions())[0].volume).toBe(0.03);

    const tooMuch = await broker.closePosition('1', 0.04);
    expect(tooMuch).toEqual({
      accepted: false,
      retcode: Retcode.InvalidRequest,
      reason: 'Invalid close volume 0.04 for 0.03',
    });

    await broker.closePosition('1', 0.03);
    expect(await broker.listOpenPositions()).toEqual([]);
  });

  it('reports unknown ids as not found', async () => {
    expect((await broker.cancelOrder('99')).retcode).toBe(Retcode.NotFound);
    expect((await broker.modifyPosition('99', 1, 2)).retcode).toBe(Retcode.NotFound);
    expect((await broker.closePosition('99', 1)).retcode).toBe(Retcode.NotFound);
  });

  it('returns copies of quotes and symbol info as seeded', async () => {
    broker.setQuote('XAUUSD', { bid: 1, ask: 2 });
    broker.setSymbolInfo({ symbol: 'XAUUSD', digits: 2 });

    expect(await broker.getQuote('XAUUSD')).toEqual({ bid: 1, ask: 2 });
    expect(await broker.getSymbolInfo('XAUUSD')).toEqual({ symbol: 'XAUUSD', digits: 2 });
    expect(await broker.getQuote('EURUSD')).toBeNull();

    broker.clearQuote('XAUUSD');
    expect(await broker.getQuote('XAUUSD')).toBeNull();
  });
});
